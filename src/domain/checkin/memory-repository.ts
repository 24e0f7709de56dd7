import { randomUUID } from 'crypto';
import type { CheckInInput, CheckInRecord, HistoryFilter } from '../../shared/types';
import { normalizeKeyword } from '../../shared/validation';
import type { CheckinStore } from './repository';

/**
 * Process-local check-in store. Records are frozen on insert.
 * Same ordering and filter semantics as the Postgres repository.
 */
export class InMemoryCheckinRepository implements CheckinStore {
  private records: CheckInRecord[] = [];

  constructor(seed: readonly CheckInRecord[] = []) {
    for (const record of seed) {
      this.insert(record);
    }
  }

  insert(record: CheckInRecord): CheckInRecord {
    if (this.records.some((r) => r.id === record.id)) {
      throw new Error(`Duplicate check-in id: ${record.id}`);
    }
    const frozen = Object.freeze({ ...record });
    this.records.push(frozen);
    return frozen;
  }

  async createRecord(subjectId: string, input: CheckInInput, createdAt: Date): Promise<CheckInRecord> {
    return this.insert({ id: randomUUID(), subjectId, createdAt, ...input });
  }

  async findById(checkInId: string): Promise<CheckInRecord | null> {
    return this.records.find((r) => r.id === checkInId) ?? null;
  }

  async fetchHistory(subjectId: string, filter: HistoryFilter = {}): Promise<CheckInRecord[]> {
    const keyword = normalizeKeyword(filter.keyword)?.toLowerCase();
    const start = filter.startDate?.getTime();
    const end = filter.endDate?.getTime();

    const matching = this.records.filter((r) => {
      if (r.subjectId !== subjectId) return false;
      const ts = r.createdAt?.getTime();
      if (start !== undefined && (ts === undefined || ts < start)) return false;
      if (end !== undefined && (ts === undefined || ts > end)) return false;
      if (keyword) {
        const haystacks = [r.symptomsText, r.concernsText].map((t) => t?.toLowerCase() ?? '');
        if (!haystacks.some((t) => t.includes(keyword))) return false;
      }
      return true;
    });

    // Newest first, undated rows last
    const ordered = [...matching].sort((a, b) => {
      const ta = a.createdAt?.getTime() ?? Number.NEGATIVE_INFINITY;
      const tb = b.createdAt?.getTime() ?? Number.NEGATIVE_INFINITY;
      if (ta === tb) return 0;
      return tb > ta ? 1 : -1;
    });

    return filter.limit === undefined
      ? ordered
      : ordered.slice(0, Math.max(0, Math.floor(filter.limit)));
  }
}
