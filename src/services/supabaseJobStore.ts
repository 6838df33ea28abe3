/**
 * supabaseJobStore.ts — JobResultStore on a Supabase (PostgREST) table.
 *
 * Expected table (insert-only; grant the service role INSERT and SELECT only):
 *
 *   create table job_events (
 *     id         bigserial primary key,
 *     job_id     text        not null,
 *     type       text        not null,
 *     at         timestamptz not null,
 *     school_id  text,
 *     credential_ref text,
 *     payload    jsonb       not null
 *   );
 *   create index on job_events (job_id, id);
 *
 * `school_id` and `credential_ref` are filled on `submitted` rows only, so
 * history queries filter without reaching into the JSON payload.
 */

import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { Logger } from '../core/logger';
import type { JobEvent, JobQuery, JobView, ScrapeJob } from '../core/types';
import {
  artifactsOf,
  byCreation,
  foldJobEvents,
  matchesQuery,
} from './jobResultStore';
import type { JobResultStore } from './jobResultStore';

const logger = new Logger('SupabaseJobStore');

const TABLE = 'job_events';

/** PostgREST caps a response at 1000 rows by default. */
export const PAGE_SIZE = 1000;

/** Job ids per `.in()` filter, keeping request URLs short. */
const ID_CHUNK = 100;

// ── Row payload schema ─────────────────────────────────────

const errorKindSchema = z.enum([
  'AuthError',
  'SessionExpired',
  'NavigationTimeout',
  'LayoutChanged',
  'PartialDataError',
  'TemplateError',
  'Cancelled',
  'Unexpected',
]);

const jobErrorSchema = z.object({
  kind: errorKindSchema,
  message: z.string(),
  diagnosticRef: z.string().optional(),
});

const jobStatusSchema = z.enum(['Queued', 'Running', 'Retrying', 'Completed', 'Failed', 'Cancelled']);

const jobSpecSchema = z.object({
  schoolId: z.string(),
  classId: z.string(),
  period: z.string(),
  credentialRef: z.string(),
  locale: z.string().optional(),
  templates: z.array(z.string()).optional(),
});

const artifactRefSchema = z.object({
  id: z.string(),
  jobId: z.string(),
  locale: z.enum(['ru', 'kk']),
  templateId: z.string(),
  format: z.enum(['xlsx', 'docx']),
  path: z.string(),
});

const jobEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('submitted'), at: z.string(), jobId: z.string(), fingerprint: z.string(), spec: jobSpecSchema }),
  z.object({ type: z.literal('status'), at: z.string(), status: jobStatusSchema, attempt: z.number() }),
  z.object({ type: z.literal('state'), at: z.string(), from: z.string(), to: z.string(), attempt: z.number() }),
  z.object({ type: z.literal('retry-scheduled'), at: z.string(), attempt: z.number(), delayMs: z.number(), error: jobErrorSchema }),
  z.object({ type: z.literal('error'), at: z.string(), attempt: z.number(), error: jobErrorSchema }),
  z.object({ type: z.literal('recovered'), at: z.string(), attempt: z.number(), error: jobErrorSchema }),
  z.object({ type: z.literal('artifact'), at: z.string(), artifact: artifactRefSchema }),
  z.object({ type: z.literal('cancel-requested'), at: z.string() }),
  z.object({ type: z.literal('note'), at: z.string(), level: z.enum(['info', 'warn']), message: z.string() }),
]);

const eventRowSchema = z.object({
  job_id: z.string(),
  payload: jobEventSchema,
});

// ── Store ──────────────────────────────────────────────────

export class SupabaseJobStore implements JobResultStore {
  private readonly client: SupabaseClient;

  /**
   * @param client - An existing Supabase client, or `undefined` to build one
   *   from SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.
   */
  constructor(client?: SupabaseClient) {
    if (client) {
      this.client = client;
    } else {
      const url = process.env.SUPABASE_URL;
      const key = process.env.SUPABASE_SERVICE_ROLE_KEY;
      if (!url || !key) {
        throw new Error(
          'SupabaseJobStore: SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be ' +
            'set in the environment.  See .env.example.',
        );
      }
      this.client = createClient(url, key);
    }
  }

  async record(jobId: string, event: JobEvent): Promise<void> {
    const { error } = await this.client.from(TABLE).insert({
      job_id: jobId,
      type: event.type,
      at: event.at,
      school_id: event.type === 'submitted' ? event.spec.schoolId : null,
      credential_ref: event.type === 'submitted' ? event.spec.credentialRef : null,
      payload: event,
    });

    if (error) {
      throw new Error(`SupabaseJobStore.record(${jobId}, ${event.type}) failed: ${error.message}`);
    }
  }

  async get(jobId: string): Promise<JobView | undefined> {
    const events = (await this.eventsFor([jobId])).get(jobId);
    if (!events) return undefined;
    const job = foldJobEvents(events);
    if (!job) return undefined;
    return { job, artifacts: artifactsOf(events), log: events };
  }

  async query(filter: JobQuery): Promise<ScrapeJob[]> {
    const rows = await readAllPages('query', (from, to) => {
      let request = this.client
        .from(TABLE)
        .select('job_id', { count: 'exact' })
        .eq('type', 'submitted');

      if (filter.schoolId !== undefined) request = request.eq('school_id', filter.schoolId);
      if (filter.credentialRef !== undefined) request = request.eq('credential_ref', filter.credentialRef);
      if (filter.from !== undefined) request = request.gte('at', filter.from);
      if (filter.to !== undefined) request = request.lt('at', filter.to);

      return request.order('id', { ascending: true }).range(from, to);
    });

    const ids = z.array(z.object({ job_id: z.string() })).parse(rows).map((r) => r.job_id);
    if (ids.length === 0) return [];

    const logs = await this.eventsFor(ids);
    const jobs: ScrapeJob[] = [];
    for (const events of logs.values()) {
      const job = foldJobEvents(events);
      if (job && matchesQuery(job, filter)) jobs.push(job);
    }

    logger.debug(`History query matched ${jobs.length} job(s)`);
    return jobs.sort(byCreation);
  }

  // ── Internals ──────────────────────────────────────────

  private async eventsFor(jobIds: string[]): Promise<Map<string, JobEvent[]>> {
    const data: unknown[] = [];
    for (let i = 0; i < jobIds.length; i += ID_CHUNK) {
      const chunk = jobIds.slice(i, i + ID_CHUNK);
      const rows = await readAllPages('reading events', (from, to) =>
        this.client
          .from(TABLE)
          .select('job_id, payload', { count: 'exact' })
          .in('job_id', chunk)
          .order('id', { ascending: true })
          .range(from, to),
      );
      data.push(...rows);
    }

    const logs = new Map<string, JobEvent[]>();
    for (const raw of data) {
      const row = eventRowSchema.safeParse(raw);
      if (!row.success) {
        logger.warn(`Skipping unreadable job_events row: ${row.error.issues[0]?.message ?? 'invalid'}`);
        continue;
      }
      const log = logs.get(row.data.job_id) ?? [];
      log.push(row.data.payload);
      logs.set(row.data.job_id, log);
    }
    return logs;
  }
}

// ── Paging ─────────────────────────────────────────────────

/** One `.range()` response, as PostgREST returns it with `count: 'exact'`. */
export interface PageResult {
  data: unknown[] | null;
  error: { message: string } | null;
  count: number | null;
}

/**
 * Reads every row of a ranged select, one page at a time.  Stops once the
 * reported count is reached; throws when a page comes back short of it.
 */
export async function readAllPages(
  operation: string,
  fetchPage: (from: number, to: number) => PromiseLike<PageResult>,
  pageSize = PAGE_SIZE,
): Promise<unknown[]> {
  const rows: unknown[] = [];
  let expected = -1;

  for (;;) {
    const from = rows.length;
    const { data, error, count } = await fetchPage(from, from + pageSize - 1);
    if (error) {
      throw new Error(`SupabaseJobStore: ${operation} failed: ${error.message}`);
    }
    if (count === null) {
      throw new Error(`SupabaseJobStore: ${operation} returned no row count`);
    }
    if (expected < 0) expected = count;

    const page = data ?? [];
    rows.push(...page);
    if (rows.length >= expected) break;
    if (page.length === 0) {
      throw new Error(
        `SupabaseJobStore: ${operation} read ${rows.length} of ${expected} row(s); the table changed or the server truncated the result`,
      );
    }
  }

  if (rows.length > expected) {
    logger.warn(`${operation}: ${rows.length - expected} row(s) arrived after the count was taken`);
  }
  return rows;
}
