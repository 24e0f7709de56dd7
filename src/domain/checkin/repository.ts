import type { Pool, QueryResult } from 'pg';
import { randomUUID } from 'crypto';
import {
  type CheckInInput,
  type CheckInRecord,
  type HistoryFilter,
  isEnergyBucket,
  isMoodBucket,
} from '../../shared/types';
import { DatabaseError, asError } from '../../shared/errors';
import { normalizeKeyword } from '../../shared/validation';

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Read side consumed by trends and escalation. Always newest-first by createdAt.
 */
export interface HistorySource {
  fetchHistory(subjectId: string, filter?: HistoryFilter): Promise<CheckInRecord[]>;
}

export interface CheckinStore extends HistorySource {
  createRecord(subjectId: string, input: CheckInInput, createdAt: Date): Promise<CheckInRecord>;
  findById(checkInId: string): Promise<CheckInRecord | null>;
}

interface CheckinRow {
  id: string;
  subject_id: string;
  created_at: Date | null;
  pain_level: number;
  energy_bucket: string | null;
  mood_bucket: string | null;
  symptoms: string | null;
  concerns: string | null;
  team_note: string | null;
}

const CHECKIN_COLUMNS = `id, subject_id, created_at, pain_level, energy_bucket,
  mood_bucket, symptoms, concerns, team_note`;

// ============================================================================
// Postgres
// ============================================================================

export class PostgresCheckinRepository implements CheckinStore {
  constructor(private db: Pool) {}

  async createRecord(subjectId: string, input: CheckInInput, createdAt: Date): Promise<CheckInRecord> {
    let result: QueryResult<CheckinRow>;
    try {
      result = await this.db.query<CheckinRow>(
        `INSERT INTO check_ins
         (id, subject_id, created_at, pain_level, energy_bucket, mood_bucket, symptoms, concerns, team_note)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         RETURNING ${CHECKIN_COLUMNS}`,
        [
          randomUUID(),
          subjectId,
          createdAt,
          input.painLevel,
          input.energyBucket ?? null,
          input.moodBucket ?? null,
          input.symptomsText ?? null,
          input.concernsText ?? null,
          input.teamNote ?? null,
        ]
      );
    } catch (error) {
      const err = asError(error);
      throw new DatabaseError(`Failed to store check-in: ${err.message}`, err);
    }

    const row = result.rows[0];
    if (!row) {
      throw new DatabaseError(`Insert returned no row for subject ${subjectId}`);
    }
    return mapRow(row);
  }

  async findById(checkInId: string): Promise<CheckInRecord | null> {
    const result = await this.db.query<CheckinRow>(
      `SELECT ${CHECKIN_COLUMNS} FROM check_ins WHERE id = $1`,
      [checkInId]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async fetchHistory(subjectId: string, filter: HistoryFilter = {}): Promise<CheckInRecord[]> {
    const conditions = ['subject_id = $1'];
    const params: unknown[] = [subjectId];

    if (filter.startDate) {
      params.push(filter.startDate);
      conditions.push(`created_at >= $${params.length}`);
    }

    if (filter.endDate) {
      params.push(filter.endDate);
      conditions.push(`created_at <= $${params.length}`);
    }

    const keyword = normalizeKeyword(filter.keyword);
    if (keyword) {
      params.push(`%${escapeLike(keyword)}%`);
      conditions.push(`(symptoms ILIKE $${params.length} OR concerns ILIKE $${params.length})`);
    }

    let limitClause = '';
    if (filter.limit !== undefined) {
      params.push(Math.max(0, Math.floor(filter.limit)));
      limitClause = `LIMIT $${params.length}`;
    }

    const result = await this.db.query<CheckinRow>(
      `SELECT ${CHECKIN_COLUMNS}
       FROM check_ins
       WHERE ${conditions.join(' AND ')}
       ORDER BY created_at DESC NULLS LAST
       ${limitClause}`,
      params
    );

    return result.rows.map(mapRow);
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function mapRow(row: CheckinRow): CheckInRecord {
  return {
    id: row.id,
    subjectId: row.subject_id,
    createdAt: row.created_at,
    painLevel: row.pain_level,
    ...(isEnergyBucket(row.energy_bucket) ? { energyBucket: row.energy_bucket } : {}),
    ...(isMoodBucket(row.mood_bucket) ? { moodBucket: row.mood_bucket } : {}),
    ...(row.symptoms ? { symptomsText: row.symptoms } : {}),
    ...(row.concerns ? { concernsText: row.concerns } : {}),
    ...(row.team_note ? { teamNote: row.team_note } : {}),
  };
}
