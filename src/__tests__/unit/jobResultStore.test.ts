import type { JobEvent, JobSpec } from '../../core/types';
import { InMemoryJobStore, applyJobEvent, foldJobEvents } from '../../services/jobResultStore';

const spec: JobSpec = { schoolId: 'school-17', classId: '411', period: '2', credentialRef: 'teacher-a' };

function submitted(jobId: string, at: string, overrides: Partial<JobSpec> = {}): JobEvent {
  return { type: 'submitted', at, jobId, fingerprint: `fp-${jobId}`, spec: { ...spec, ...overrides } };
}

describe('foldJobEvents', () => {
  it('derives status, attempt and error from the event order', () => {
    const error = { kind: 'NavigationTimeout' as const, message: 'Grade table did not appear' };
    const events: JobEvent[] = [
      submitted('j1', '2026-02-10T09:00:00.000Z'),
      { type: 'status', at: '2026-02-10T09:00:01.000Z', status: 'Running', attempt: 1 },
      { type: 'error', at: '2026-02-10T09:00:02.000Z', attempt: 1, error },
      { type: 'retry-scheduled', at: '2026-02-10T09:00:02.000Z', attempt: 1, delayMs: 2000, error },
      { type: 'status', at: '2026-02-10T09:00:02.000Z', status: 'Retrying', attempt: 1 },
    ];

    expect(foldJobEvents(events)).toEqual({
      id: 'j1',
      fingerprint: 'fp-j1',
      spec,
      status: 'Retrying',
      attempt: 1,
      createdAt: '2026-02-10T09:00:00.000Z',
      updatedAt: '2026-02-10T09:00:02.000Z',
      cancelRequested: false,
      error,
    });
  });

  it('clears the error once the job completes', () => {
    const job = foldJobEvents([
      submitted('j1', '2026-02-10T09:00:00.000Z'),
      { type: 'error', at: '2026-02-10T09:00:02.000Z', attempt: 1, error: { kind: 'SessionExpired', message: 'x' } },
      { type: 'status', at: '2026-02-10T09:00:09.000Z', status: 'Completed', attempt: 2 },
    ]);
    expect(job?.status).toBe('Completed');
    expect(job?.error).toBeUndefined();
  });

  it('ignores events before submission', () => {
    expect(applyJobEvent(undefined, { type: 'cancel-requested', at: '2026-02-10T09:00:00.000Z' })).toBeUndefined();
  });

  it('does not treat a recovered expiry as an error', () => {
    const job = foldJobEvents([
      submitted('j1', '2026-02-10T09:00:00.000Z'),
      { type: 'recovered', at: '2026-02-10T09:00:03.000Z', attempt: 1, error: { kind: 'SessionExpired', message: 'x' } },
    ]);
    expect(job?.error).toBeUndefined();
  });
});

describe('InMemoryJobStore', () => {
  async function seeded(): Promise<InMemoryJobStore> {
    const store = new InMemoryJobStore();
    await store.record('j2', submitted('j2', '2026-02-11T09:00:00.000Z', { schoolId: 'school-9' }));
    await store.record('j1', submitted('j1', '2026-02-10T09:00:00.000Z'));
    await store.record('j3', submitted('j3', '2026-02-12T09:00:00.000Z', { credentialRef: 'teacher-b' }));
    await store.record('j1', {
      type: 'artifact',
      at: '2026-02-10T09:01:00.000Z',
      artifact: { id: 'j1:grades-sheet:ru', jobId: 'j1', locale: 'ru', templateId: 'grades-sheet', format: 'xlsx', path: 'out/j1.xlsx' },
    });
    await store.record('j1', { type: 'status', at: '2026-02-10T09:01:00.000Z', status: 'Completed', attempt: 1 });
    return store;
  }

  it('returns the job, its artifacts and the full log', async () => {
    const view = await (await seeded()).get('j1');
    expect(view?.job.status).toBe('Completed');
    expect(view?.artifacts.map((a) => a.path)).toEqual(['out/j1.xlsx']);
    expect(view?.log.map((e) => e.type)).toEqual(['submitted', 'artifact', 'status']);
  });

  it('returns undefined for unknown ids', async () => {
    expect(await (await seeded()).get('nope')).toBeUndefined();
  });

  it('filters by school, credential and range, oldest first', async () => {
    const store = await seeded();
    expect((await store.query({})).map((j) => j.id)).toEqual(['j1', 'j2', 'j3']);
    expect((await store.query({ schoolId: 'school-17' })).map((j) => j.id)).toEqual(['j1', 'j3']);
    expect((await store.query({ credentialRef: 'teacher-b' })).map((j) => j.id)).toEqual(['j3']);
    expect(
      (await store.query({ from: '2026-02-11T09:00:00.000Z', to: '2026-02-12T09:00:00.000Z' })).map((j) => j.id),
    ).toEqual(['j2']);
  });

  it('keeps stored events immutable', async () => {
    const view = await (await seeded()).get('j1');
    expect(view?.log.every((e) => Object.isFrozen(e))).toBe(true);
  });
});
