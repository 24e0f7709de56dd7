import { describe, expect, it } from 'vitest';
import { HistoryUnavailableError, SubjectNotFoundError } from '../../shared/errors';
import type { EscalationJobData } from '../../shared/types';
import { InMemorySubjectDirectory } from '../subject/service';
import { InMemoryCheckinRepository } from './memory-repository';
import { CheckinService } from './service';

const AT = new Date('2024-06-30T12:00:00Z');
const subjects = new InMemorySubjectDirectory([
  { id: 's1', displayName: 'Test Subject', createdAt: new Date('2024-01-01T00:00:00Z') },
]);

function setup(enqueue?: (data: EscalationJobData) => Promise<unknown>) {
  const jobs: EscalationJobData[] = [];
  const store = new InMemoryCheckinRepository();
  const service = new CheckinService(
    store,
    subjects,
    enqueue ??
      (async (data) => {
        jobs.push(data);
      })
  );
  return { service, store, jobs };
}

describe('CheckinService', () => {
  it('stores a sanitized check-in and enqueues its evaluation', async () => {
    const { service, store, jobs } = setup();

    const record = await service.submitCheckin(
      's1',
      { painLevel: 12, moodBucket: 'sad', symptomsText: '  cramps  ', teamNote: '   ' },
      AT
    );

    expect(record).toMatchObject({
      subjectId: 's1',
      createdAt: AT,
      painLevel: 10,
      moodBucket: 'sad',
      symptomsText: 'cramps',
    });
    expect(record.teamNote).toBeUndefined();
    expect(await store.findById(record.id)).toEqual(record);
    expect(jobs).toEqual([
      { subjectId: 's1', checkInId: record.id, submittedAt: '2024-06-30T12:00:00.000Z' },
    ]);
  });

  it('keeps the check-in when enqueueing fails', async () => {
    const { service, store } = setup(async () => {
      throw new Error('redis down');
    });

    const record = await service.submitCheckin('s1', { painLevel: 3 }, AT);

    expect(await store.findById(record.id)).toEqual(record);
  });

  it('rejects unknown subjects', async () => {
    const { service, jobs } = setup();

    await expect(service.submitCheckin('nope', { painLevel: 3 }, AT)).rejects.toBeInstanceOf(
      SubjectNotFoundError
    );
    expect(jobs).toEqual([]);
  });

  it('lists history newest-first and summarises the latest record', async () => {
    const { service } = setup();
    await service.submitCheckin('s1', { painLevel: 2 }, new Date('2024-06-28T09:00:00Z'));
    const newest = await service.submitCheckin('s1', { painLevel: 5, energyBucket: 'low' }, AT);

    const history = await service.listHistory('s1');
    expect(history.map((r) => r.painLevel)).toEqual([5, 2]);

    expect(await service.getLatestSummary('s1')).toEqual({
      checkInId: newest.id,
      lastCheckInAt: AT,
      painLevel: 5,
      energyBucket: 'low',
      moodBucket: null,
      symptomsText: null,
      concernsText: null,
      teamNote: null,
    });
  });

  it('returns a null summary for a subject without check-ins', async () => {
    const { service } = setup();
    expect(await service.getLatestSummary('s1')).toBeNull();
  });

  it('wraps history failures', async () => {
    const failing = new InMemoryCheckinRepository();
    failing.fetchHistory = async () => {
      throw new Error('boom');
    };
    const service = new CheckinService(failing, subjects, async () => undefined);

    await expect(service.listHistory('s1')).rejects.toBeInstanceOf(HistoryUnavailableError);
  });
});
