import { MS_PER_DAY } from '../../shared/calendar';
import {
  type CheckInRecord,
  DEFAULT_ESCALATION_CONFIG,
  type EscalationConfig,
  type EscalationReasonKind,
  MOOD_RANK,
  type MoodBucket,
} from '../../shared/types';
import { sortChronologically, withLatest } from '../checkin/history';

export type EscalationDetection =
  | { kind: 'highPain'; painLevel: number }
  | { kind: 'lowMood'; mood: MoodBucket }
  | { kind: 'rapidPainIncrease'; fromPain: number; toPain: number }
  | { kind: 'rapidMoodDrop'; pattern: 'sadRun' | 'dropFromBetter'; previousMood: MoodBucket | null };

/**
 * Fixed-precedence escalation rules. Single-reading rules run before trend
 * rules; the first match is the only reason reported.
 *
 *   1. highPain           latest pain >= highPainThreshold
 *   2. lowMood            latest mood rank <= rank(moodEscalationThreshold)
 *   3. rapidPainIncrease  pain rose by rapidPainIncrease within the lookback,
 *                         ending at or above rapidPainFloor
 *   4. rapidMoodDrop      latest mood sample is sad after a run of sad samples
 *                         or right after a better one
 *
 * `recentHistory` is newest-first and may or may not already contain
 * `latest`; both evaluate the same.
 */
export class EscalationDetector {
  constructor(private readonly config: EscalationConfig = DEFAULT_ESCALATION_CONFIG) {}

  detect(
    latest: CheckInRecord,
    recentHistory: readonly CheckInRecord[],
    now: Date
  ): EscalationReasonKind | null {
    return this.evaluate(latest, recentHistory, now)?.kind ?? null;
  }

  evaluate(
    latest: CheckInRecord,
    recentHistory: readonly CheckInRecord[],
    now: Date
  ): EscalationDetection | null {
    if (latest.painLevel >= this.config.highPainThreshold) {
      return { kind: 'highPain', painLevel: latest.painLevel };
    }

    if (
      latest.moodBucket &&
      MOOD_RANK[latest.moodBucket] <= MOOD_RANK[this.config.moodEscalationThreshold]
    ) {
      return { kind: 'lowMood', mood: latest.moodBucket };
    }

    const history = withLatest(latest, recentHistory);

    return this.detectRapidPainIncrease(history, now) ?? this.detectRapidMoodDrop(history, now);
  }

  private detectRapidPainIncrease(
    history: readonly CheckInRecord[],
    now: Date
  ): EscalationDetection | null {
    const window = sortChronologically(
      recordsSince(history, now, this.config.rapidPainLookbackDays)
    );

    if (window.length < this.config.minTrendSamples) {
      return null;
    }

    const first = window[0];
    const last = window[window.length - 1];
    if (!first || !last) {
      return null;
    }

    const delta = last.painLevel - first.painLevel;
    if (delta >= this.config.rapidPainIncrease && last.painLevel >= this.config.rapidPainFloor) {
      return { kind: 'rapidPainIncrease', fromPain: first.painLevel, toPain: last.painLevel };
    }

    return null;
  }

  private detectRapidMoodDrop(
    history: readonly CheckInRecord[],
    now: Date
  ): EscalationDetection | null {
    const moods: MoodBucket[] = [];
    for (const record of sortChronologically(
      recordsSince(history, now, this.config.rapidMoodLookbackDays)
    )) {
      if (record.moodBucket) moods.push(record.moodBucket);
    }

    if (moods.length < 2) {
      return null;
    }

    const latestMood = moods[moods.length - 1];
    const previousMood = moods[moods.length - 2] ?? null;
    if (latestMood === undefined || MOOD_RANK[latestMood] !== MOOD_RANK.sad) {
      return null;
    }

    const runLength = this.config.consecutiveSadMoodCount;
    const tail = moods.slice(-runLength);
    const sadRun = tail.length === runLength && tail.every((m) => MOOD_RANK[m] === MOOD_RANK.sad);

    const droppedFromBetter = previousMood !== null && MOOD_RANK[previousMood] > MOOD_RANK.sad;

    if (sadRun) {
      return { kind: 'rapidMoodDrop', pattern: 'sadRun', previousMood };
    }
    if (droppedFromBetter) {
      return { kind: 'rapidMoodDrop', pattern: 'dropFromBetter', previousMood };
    }

    return null;
  }
}

function recordsSince(
  history: readonly CheckInRecord[],
  now: Date,
  lookbackDays: number
): CheckInRecord[] {
  const cutoff = now.getTime() - lookbackDays * MS_PER_DAY;
  return history.filter((r) => r.createdAt !== null && r.createdAt.getTime() >= cutoff);
}
