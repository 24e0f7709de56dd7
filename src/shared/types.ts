// ============================================================================
// Check-in Types
// ============================================================================

export const ENERGY_BUCKETS = ['low', 'okay', 'high'] as const;
export const MOOD_BUCKETS = ['sad', 'neutral', 'good'] as const;

export type EnergyBucket = (typeof ENERGY_BUCKETS)[number];
export type MoodBucket = (typeof MOOD_BUCKETS)[number];

/**
 * Severity scales. Higher rank = better. Compare buckets through these
 * tables, never through declaration order.
 */
export const ENERGY_RANK: Readonly<Record<EnergyBucket, number>> = {
  low: 0,
  okay: 1,
  high: 2,
};

export const MOOD_RANK: Readonly<Record<MoodBucket, number>> = {
  sad: 0,
  neutral: 1,
  good: 2,
};

export const MOOD_LABELS: Readonly<Record<MoodBucket, string>> = {
  sad: 'Sad',
  neutral: 'Neutral',
  good: 'Good',
};

export function isEnergyBucket(value: unknown): value is EnergyBucket {
  return typeof value === 'string' && (ENERGY_BUCKETS as readonly string[]).includes(value);
}

export function isMoodBucket(value: unknown): value is MoodBucket {
  return typeof value === 'string' && (MOOD_BUCKETS as readonly string[]).includes(value);
}

export const PAIN_MIN = 0;
export const PAIN_MAX = 10;

/**
 * One submitted check-in. Immutable once stored.
 * `createdAt` is null only for legacy imported rows.
 */
export interface CheckInRecord {
  readonly id: string;
  readonly subjectId: string;
  readonly createdAt: Date | null;
  readonly painLevel: number;
  readonly energyBucket?: EnergyBucket;
  readonly moodBucket?: MoodBucket;
  readonly symptomsText?: string;
  readonly concernsText?: string;
  readonly teamNote?: string;
}

export interface CheckInInput {
  painLevel: number;
  energyBucket?: EnergyBucket;
  moodBucket?: MoodBucket;
  symptomsText?: string;
  concernsText?: string;
  teamNote?: string;
}

export interface HistoryFilter {
  /** Inclusive lower bound */
  startDate?: Date;
  /** Inclusive upper bound */
  endDate?: Date;
  /** Case-insensitive match on symptoms OR concerns */
  keyword?: string;
  limit?: number;
}

export interface Subject {
  id: string;
  displayName: string | null;
  createdAt: Date;
}

// ============================================================================
// Escalation Types
// ============================================================================

export const ESCALATION_REASONS = [
  'highPain',
  'lowMood',
  'rapidPainIncrease',
  'rapidMoodDrop',
] as const;

export type EscalationReasonKind = (typeof ESCALATION_REASONS)[number];

export interface EscalationConfig {
  readonly highPainThreshold: number;
  readonly moodEscalationThreshold: MoodBucket;
  readonly rapidPainLookbackDays: number;
  readonly rapidPainIncrease: number;
  readonly rapidPainFloor: number;
  readonly rapidMoodLookbackDays: number;
  readonly minTrendSamples: number;
  readonly notificationCooldownHours: number;
  readonly consecutiveSadMoodCount: number;
  readonly maxHistorySamples: number;
}

export const DEFAULT_ESCALATION_CONFIG: EscalationConfig = Object.freeze({
  highPainThreshold: 8,
  moodEscalationThreshold: 'sad',
  rapidPainLookbackDays: 3,
  rapidPainIncrease: 3,
  rapidPainFloor: 6,
  rapidMoodLookbackDays: 5,
  minTrendSamples: 3,
  notificationCooldownHours: 12,
  consecutiveSadMoodCount: 2,
  maxHistorySamples: 15,
});

// ============================================================================
// Job Types
// ============================================================================

export interface EscalationJobData {
  subjectId: string;
  checkInId: string;
  submittedAt: string;
}

export type EscalationOutcome =
  | { status: 'notified'; reason: EscalationReasonKind }
  | { status: 'suppressed'; reason: EscalationReasonKind }
  | { status: 'none' }
  | { status: 'skipped'; error: string };

// ============================================================================
// API Types
// ============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  correlationId?: string;
}
