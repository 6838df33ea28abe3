/**
 * jobResultStore.ts — Append-only job log plus the queries built on it.
 *
 * Nothing is ever updated in place.  A job's current state (status, attempt,
 * last error, artifacts) is recomputed by folding its events in order, so
 * the in-memory store, the Supabase store and the orchestrator's own view
 * all agree as long as they saw the same events.
 */

import type {
  ArtifactRef,
  JobEvent,
  JobQuery,
  JobView,
  ScrapeJob,
} from '../core/types';

export interface JobResultStore {
  /** Append one event.  Appends for one job id land in call order. */
  record(jobId: string, event: JobEvent): Promise<void>;
  get(jobId: string): Promise<JobView | undefined>;
  /** Jobs matching the filter, oldest first. */
  query(filter: JobQuery): Promise<ScrapeJob[]>;
}

// ── Fold ───────────────────────────────────────────────────

/**
 * Apply one event to a job snapshot.  `undefined` in, `submitted` event →
 * the job's first state; any other event before `submitted` is ignored.
 */
export function applyJobEvent(job: ScrapeJob | undefined, event: JobEvent): ScrapeJob | undefined {
  if (event.type === 'submitted') {
    return {
      id: event.jobId,
      fingerprint: event.fingerprint,
      spec: event.spec,
      status: 'Queued',
      attempt: 0,
      createdAt: event.at,
      updatedAt: event.at,
      cancelRequested: false,
    };
  }
  if (!job) return undefined;

  switch (event.type) {
    case 'status': {
      const next: ScrapeJob = { ...job, status: event.status, attempt: event.attempt, updatedAt: event.at };
      if (event.status === 'Completed' || event.status === 'Cancelled') delete next.error;
      return next;
    }
    case 'error':
    case 'retry-scheduled':
      return { ...job, error: event.error, updatedAt: event.at };
    case 'cancel-requested':
      return { ...job, cancelRequested: true, updatedAt: event.at };
    case 'state':
    case 'recovered':
    case 'artifact':
    case 'note':
      return { ...job, updatedAt: event.at };
  }
}

export function foldJobEvents(events: readonly JobEvent[]): ScrapeJob | undefined {
  return events.reduce<ScrapeJob | undefined>(applyJobEvent, undefined);
}

export function artifactsOf(events: readonly JobEvent[]): ArtifactRef[] {
  const artifacts: ArtifactRef[] = [];
  for (const event of events) {
    if (event.type === 'artifact') artifacts.push(event.artifact);
  }
  return artifacts;
}

export function matchesQuery(job: ScrapeJob, filter: JobQuery): boolean {
  if (filter.schoolId !== undefined && job.spec.schoolId !== filter.schoolId) return false;
  if (filter.credentialRef !== undefined && job.spec.credentialRef !== filter.credentialRef) return false;
  if (filter.from !== undefined && job.createdAt < filter.from) return false;
  if (filter.to !== undefined && job.createdAt >= filter.to) return false;
  return true;
}

/** Oldest first; ties keep submission order. */
export function byCreation(a: ScrapeJob, b: ScrapeJob): number {
  return a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0;
}

// ── In-memory implementation ───────────────────────────────

export class InMemoryJobStore implements JobResultStore {
  private readonly logs = new Map<string, JobEvent[]>();

  async record(jobId: string, event: JobEvent): Promise<void> {
    const log = this.logs.get(jobId);
    if (log) {
      log.push(Object.freeze({ ...event }));
    } else {
      this.logs.set(jobId, [Object.freeze({ ...event })]);
    }
  }

  async get(jobId: string): Promise<JobView | undefined> {
    const log = this.logs.get(jobId);
    if (!log) return undefined;
    const job = foldJobEvents(log);
    if (!job) return undefined;
    return { job, artifacts: artifactsOf(log), log: [...log] };
  }

  async query(filter: JobQuery): Promise<ScrapeJob[]> {
    const jobs: ScrapeJob[] = [];
    for (const log of this.logs.values()) {
      const job = foldJobEvents(log);
      if (job && matchesQuery(job, filter)) jobs.push(job);
    }
    return jobs.sort(byCreation);
  }
}
