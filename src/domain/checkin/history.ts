import type { CheckInRecord, EnergyBucket, MoodBucket } from '../../shared/types';

/**
 * Oldest first. Stable, so equal timestamps keep fetch order; undated rows first.
 */
export function sortChronologically(records: readonly CheckInRecord[]): CheckInRecord[] {
  return [...records].sort((a, b) => {
    const ta = a.createdAt?.getTime() ?? Number.NEGATIVE_INFINITY;
    const tb = b.createdAt?.getTime() ?? Number.NEGATIVE_INFINITY;
    if (ta === tb) return 0;
    return ta < tb ? -1 : 1;
  });
}

/**
 * Newest-first history that contains `latest` exactly once, whether or not the
 * caller's window already held it.
 */
export function withLatest(
  latest: CheckInRecord,
  newestFirst: readonly CheckInRecord[]
): CheckInRecord[] {
  if (newestFirst.some((r) => r.id === latest.id)) {
    return [...newestFirst];
  }
  return [latest, ...newestFirst];
}

export interface LatestSummary {
  checkInId: string;
  lastCheckInAt: Date | null;
  painLevel: number;
  energyBucket: EnergyBucket | null;
  moodBucket: MoodBucket | null;
  symptomsText: string | null;
  concernsText: string | null;
  teamNote: string | null;
}

/**
 * Summary fields of a subject, derived from its newest-first history on demand.
 */
export function latestSummary(newestFirst: readonly CheckInRecord[]): LatestSummary | null {
  const latest = newestFirst[0];
  if (!latest) {
    return null;
  }

  return {
    checkInId: latest.id,
    lastCheckInAt: latest.createdAt,
    painLevel: latest.painLevel,
    energyBucket: latest.energyBucket ?? null,
    moodBucket: latest.moodBucket ?? null,
    symptomsText: latest.symptomsText ?? null,
    concernsText: latest.concernsText ?? null,
    teamNote: latest.teamNote ?? null,
  };
}
