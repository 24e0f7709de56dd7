import type { Pool } from 'pg';
import { MS_PER_HOUR } from '../../shared/calendar';
import type { EscalationReasonKind } from '../../shared/types';

export interface CooldownKey {
  subjectId: string;
  reason: EscalationReasonKind;
}

/**
 * Last time an alert was dispatched per (subject, reason). Records are never
 * deleted. `upsert` must be atomic per key and must never move a timestamp
 * backwards.
 */
export interface CooldownStore {
  lastNotifiedAt(key: CooldownKey): Promise<Date | null>;
  upsert(key: CooldownKey, notifiedAt: Date): Promise<void>;
}

// ============================================================================
// Throttle
// ============================================================================

/**
 * Keyed last-seen store with one question: has the cooldown elapsed?
 * Knows nothing about what a reason means.
 */
export class NotificationThrottle {
  private readonly cooldownMs: number;

  constructor(private store: CooldownStore, cooldownHours: number) {
    this.cooldownMs = cooldownHours * MS_PER_HOUR;
  }

  async shouldNotify(subjectId: string, reason: EscalationReasonKind, now: Date): Promise<boolean> {
    const last = await this.store.lastNotifiedAt({ subjectId, reason });
    if (!last) {
      return true;
    }
    return now.getTime() - last.getTime() >= this.cooldownMs;
  }

  async markNotified(subjectId: string, reason: EscalationReasonKind, now: Date): Promise<void> {
    await this.store.upsert({ subjectId, reason }, now);
  }
}

// ============================================================================
// Stores
// ============================================================================

export class PostgresCooldownStore implements CooldownStore {
  constructor(private db: Pool) {}

  async lastNotifiedAt(key: CooldownKey): Promise<Date | null> {
    const result = await this.db.query<{ last_notified_at: Date }>(
      `SELECT last_notified_at
       FROM escalation_cooldowns
       WHERE subject_id = $1 AND reason = $2`,
      [key.subjectId, key.reason]
    );
    return result.rows[0]?.last_notified_at ?? null;
  }

  async upsert(key: CooldownKey, notifiedAt: Date): Promise<void> {
    await this.db.query(
      `INSERT INTO escalation_cooldowns (subject_id, reason, last_notified_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (subject_id, reason) DO UPDATE
       SET last_notified_at = GREATEST(escalation_cooldowns.last_notified_at, EXCLUDED.last_notified_at)`,
      [key.subjectId, key.reason, notifiedAt]
    );
  }
}

export class InMemoryCooldownStore implements CooldownStore {
  private entries = new Map<string, Map<EscalationReasonKind, Date>>();

  async lastNotifiedAt(key: CooldownKey): Promise<Date | null> {
    return this.entries.get(key.subjectId)?.get(key.reason) ?? null;
  }

  async upsert(key: CooldownKey, notifiedAt: Date): Promise<void> {
    const perSubject = this.entries.get(key.subjectId) ?? new Map<EscalationReasonKind, Date>();
    const existing = perSubject.get(key.reason);
    if (!existing || existing.getTime() < notifiedAt.getTime()) {
      perSubject.set(key.reason, notifiedAt);
    }
    this.entries.set(key.subjectId, perSubject);
  }
}
