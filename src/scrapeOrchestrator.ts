/**
 * scrapeOrchestrator.ts — Job intake, scheduling, retries and results.
 *
 * ARCHITECTURE OVERVIEW
 * ─────────────────────
 * One job, one attempt:
 *
 *   1. PREFLIGHT  → resolve locale, templates and credential
 *   2. EXTRACT    → ExtractionMachine (session, navigation, table, parsing)
 *   3. NORMALISE  → recordNormalizer turns rows into typed records
 *   4. SYNTHESISE → ReportSynthesizer renders every requested template
 *   5. WRITE      → ArtifactSink stores the files, the store gets their refs
 *
 * Jobs wait in a FIFO WorkerPool whose size bounds the browsing contexts
 * open against the portal.  Transient failures go back to the pool after an
 * exponential backoff until `maxRetries` retries are spent; anything else
 * fails the job at once.  Every change is an event appended to the
 * JobResultStore, and the job's status is the fold of those events.
 */

import { createClient } from '@supabase/supabase-js';
import { randomUUID } from 'crypto';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { ExtractionMachine } from './agents/extractionMachine';
import { SessionManager } from './agents/sessionManager';
import { WorkerPool } from './agents/workerPool';
import { loadPipelineConfig } from './core/config';
import type { PipelineConfig } from './core/config';
import { academicYearStart } from './core/dateNormalizer';
import {
  AuthError,
  JobCancelled,
  PartialDataError,
  TemplateError,
  classifyError,
} from './core/errors';
import { Logger } from './core/logger';
import { normalizeExtraction } from './core/recordNormalizer';
import { isLocale, isTerminal } from './core/types';
import type {
  ArtifactRef,
  CredentialProvider,
  JobErrorInfo,
  JobEvent,
  JobQuery,
  JobSpec,
  JobView,
  Locale,
  ReportArtifact,
  ScrapeJob,
} from './core/types';
import { FileArtifactSink } from './reports/artifactSink';
import type { ArtifactSink } from './reports/artifactSink';
import { ReportSynthesizer } from './reports/reportSynthesizer';
import { TemplateRegistry } from './reports/templateRegistry';
import type { PortalDriver } from './scrapers/portalDriver';
import { PuppeteerPortalDriver } from './scrapers/puppeteerPortal';
import { InMemoryJobStore, applyJobEvent } from './services/jobResultStore';
import type { JobResultStore } from './services/jobResultStore';
import { SupabaseJobStore } from './services/supabaseJobStore';

const logger = new Logger('Orchestrator');

/** A single step may make several page waits, each bounded by stepTimeoutMs. */
const WAITS_PER_STEP = 4;

export type OrchestratorConfig = Pick<
  PipelineConfig,
  | 'poolSize'
  | 'maxRetries'
  | 'backoffBaseMs'
  | 'backoffCapMs'
  | 'stepTimeoutMs'
  | 'loginAttempts'
  | 'defaultLocale'
  | 'defaultTemplates'
>;

export interface OrchestratorDeps {
  driver: PortalDriver;
  credentials: CredentialProvider;
  templates: TemplateRegistry;
  sink: ArtifactSink;
  store?: JobResultStore;
  config: OrchestratorConfig;
  /** Injectable clock for event timestamps and academic-year resolution. */
  now?: () => Date;
}

export type CancelOutcome = 'cancelled' | 'requested' | 'already-terminal' | 'not-found';

const jobSpecSchema = z
  .object({
    schoolId: z.string().trim().min(1),
    classId: z.string().trim().min(1),
    period: z.enum(['1', '2', '3', '4']),
    credentialRef: z.string().trim().min(1),
    locale: z.string().trim().min(1).optional(),
    templates: z.array(z.string().trim().min(1)).min(1).optional(),
  })
  .strict();

/** Delay before retry number `attempt` (1-based): base·2^(attempt-1), capped. */
export function backoffDelay(attempt: number, baseMs: number, capMs: number): number {
  return Math.min(baseMs * 2 ** Math.max(0, attempt - 1), capMs);
}

/** Jobs with the same fingerprint are the same piece of work. */
export function jobFingerprint(spec: Pick<JobSpec, 'schoolId' | 'classId' | 'period' | 'credentialRef'>): string {
  return JSON.stringify([spec.schoolId, spec.classId, spec.period, spec.credentialRef]);
}

export class ScrapeOrchestrator {
  readonly sessions: SessionManager;

  private readonly jobs = new Map<string, ScrapeJob>();
  /** fingerprint → id of the job that is not yet terminal. */
  private readonly inFlight = new Map<string, string>();
  private readonly retryTimers = new Map<string, NodeJS.Timeout>();
  private readonly writes = new Map<string, Promise<void>>();
  private settleWaiters: Array<() => void> = [];

  private readonly pool: WorkerPool;
  private readonly synthesizer: ReportSynthesizer;
  private readonly store: JobResultStore;
  private readonly now: () => Date;
  private closed = false;

  constructor(private readonly deps: OrchestratorDeps) {
    this.pool = new WorkerPool(deps.config.poolSize);
    this.sessions = new SessionManager(deps.driver, { loginAttempts: deps.config.loginAttempts });
    this.synthesizer = new ReportSynthesizer(deps.templates);
    this.store = deps.store ?? new InMemoryJobStore();
    this.now = deps.now ?? (() => new Date());
  }

  // ── Public API ───────────────────────────────────────────

  /**
   * Queue a job and return its id.  While a job with the same fingerprint
   * is not terminal, its id is returned and nothing new is queued.
   */
  submit(input: JobSpec): string {
    if (this.closed) throw new Error('Orchestrator is shut down');

    const parsed = jobSpecSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid job spec: ${issues}`);
    }
    const spec: JobSpec = parsed.data;
    const fingerprint = jobFingerprint(spec);

    const existing = this.inFlight.get(fingerprint);
    if (existing) {
      logger.info(`Duplicate submission; job ${short(existing)} is still in flight`);
      return existing;
    }

    const jobId = randomUUID();
    this.inFlight.set(fingerprint, jobId);
    this.emit(jobId, { type: 'submitted', at: this.stamp(), jobId, fingerprint, spec });

    logger.info(
      `Queued job ${short(jobId)}: school ${spec.schoolId}, class ${spec.classId}, period ${spec.period}`,
    );
    this.pool.push(jobId, () => this.runJob(jobId));
    return jobId;
  }

  /** Current state of a job, or `undefined` for an unknown id. */
  status(jobId: string): ScrapeJob | undefined {
    const job = this.jobs.get(jobId);
    return job ? { ...job, spec: { ...job.spec } } : undefined;
  }

  /**
   * Queued or backing-off jobs are cancelled on the spot.  Running jobs get
   * a flag the state machine reads at its next step boundary.
   */
  cancel(jobId: string): CancelOutcome {
    const job = this.jobs.get(jobId);
    if (!job) return 'not-found';
    if (isTerminal(job.status)) return 'already-terminal';

    if (this.pool.isRunning(jobId)) {
      if (!job.cancelRequested) {
        this.emit(jobId, { type: 'cancel-requested', at: this.stamp() });
        logger.info(`Cancel requested for running job ${short(jobId)}`);
      }
      return 'requested';
    }

    const timer = this.retryTimers.get(jobId);
    if (timer) {
      clearTimeout(timer);
      this.retryTimers.delete(jobId);
    }
    this.pool.remove(jobId);

    this.emit(jobId, { type: 'cancel-requested', at: this.stamp() });
    this.finish(jobId, 'Cancelled', job.attempt);
    logger.info(`Cancelled job ${short(jobId)} before it ran`);
    return 'cancelled';
  }

  /** Job, artifacts and full event log, read from the result store. */
  async get(jobId: string): Promise<JobView | undefined> {
    await this.flush(jobId);
    return this.store.get(jobId);
  }

  async history(filter: JobQuery = {}): Promise<ScrapeJob[]> {
    await this.flushAll();
    return this.store.query(filter);
  }

  /** Resolves once every submitted job is terminal and its events are stored. */
  async idle(): Promise<void> {
    if (this.inFlight.size > 0) {
      await new Promise<void>((resolve) => this.settleWaiters.push(resolve));
    }
    await this.flushAll();
  }

  /**
   * Stop taking jobs, cancel everything not yet running, let running jobs
   * stop at their next step, then close sessions and the browser.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    logger.info('Shutting down');

    for (const jobId of this.pool.stop()) {
      this.emit(jobId, { type: 'note', at: this.stamp(), level: 'info', message: 'Dropped from the queue on shutdown' });
      this.finish(jobId, 'Cancelled', this.jobs.get(jobId)?.attempt ?? 0);
    }
    for (const [jobId, timer] of this.retryTimers) {
      clearTimeout(timer);
      this.emit(jobId, { type: 'note', at: this.stamp(), level: 'info', message: 'Retry abandoned on shutdown' });
      this.finish(jobId, 'Cancelled', this.jobs.get(jobId)?.attempt ?? 0);
    }
    this.retryTimers.clear();

    for (const [jobId, job] of this.jobs) {
      if (!isTerminal(job.status) && !job.cancelRequested) {
        this.emit(jobId, { type: 'cancel-requested', at: this.stamp() });
      }
    }

    await this.pool.onIdle();
    await this.sessions.closeAll();
    await this.deps.driver.close();
    await this.flushAll();
  }

  // ── Job execution ────────────────────────────────────────

  private async runJob(jobId: string): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job || isTerminal(job.status)) return;

    const attempt = job.attempt + 1;
    const log = logger.child(short(jobId));
    this.emit(jobId, { type: 'status', at: this.stamp(), status: 'Running', attempt });
    log.info(`Attempt ${attempt} started`);

    try {
      const artifacts = await this.runAttempt(job, attempt, log);
      for (const artifact of artifacts) {
        this.emit(jobId, { type: 'artifact', at: this.stamp(), artifact });
      }
      this.finish(jobId, 'Completed', attempt);
      log.info(`Completed with ${artifacts.length} artifact(s)`);
    } catch (raw) {
      await this.handleFailure(jobId, attempt, raw, log);
    }
  }

  private async runAttempt(job: ScrapeJob, attempt: number, log: Logger): Promise<ArtifactRef[]> {
    const { spec } = job;

    // ── 1. PREFLIGHT ───────────────────────────────────────
    const locale = this.localeFor(spec);
    const templateIds = spec.templates ?? this.deps.config.defaultTemplates;
    for (const templateId of templateIds) {
      this.deps.templates.resolve(templateId, locale);
    }

    const credential = await this.deps.credentials.resolve(spec.credentialRef);
    if (!credential) {
      throw new AuthError(`No credential is registered under "${spec.credentialRef}"`);
    }

    // ── 2. EXTRACT ─────────────────────────────────────────
    const machine = new ExtractionMachine(
      this.sessions,
      credential,
      { classId: spec.classId, period: spec.period, locale },
      {
        stepBudgetMs: this.deps.config.stepTimeoutMs * WAITS_PER_STEP,
        startYear: academicYearStart(DateTime.fromJSDate(this.now(), { zone: 'utc' })),
        logger: log,
      },
      {
        onTransition: (from, to) =>
          this.emit(job.id, { type: 'state', at: this.stamp(), from, to, attempt }),
        onRecovered: (err) =>
          this.emit(job.id, {
            type: 'recovered',
            at: this.stamp(),
            attempt,
            error: { kind: err.kind, message: err.message },
          }),
        isCancelled: () => this.jobs.get(job.id)?.cancelRequested === true,
      },
    );
    const extraction = await machine.run();

    // ── 3. NORMALISE ───────────────────────────────────────
    const sheet = normalizeExtraction(extraction, { period: spec.period });
    if (extraction.notice) {
      this.emit(job.id, { type: 'note', at: this.stamp(), level: 'info', message: `Portal notice: ${extraction.notice}` });
    }
    if (sheet.droppedRows > 0) {
      this.emit(job.id, {
        type: 'note',
        at: this.stamp(),
        level: 'warn',
        message: `${sheet.droppedRows} row(s) without a resolvable student were dropped`,
      });
    }
    if (sheet.incompleteCount > 0) {
      const partial = new PartialDataError(
        `${sheet.incompleteCount} of ${sheet.roster.length} student(s) have incomplete records`,
        sheet.incompleteCount,
      );
      this.emit(job.id, { type: 'note', at: this.stamp(), level: 'warn', message: `${partial.kind}: ${partial.message}` });
    }

    // ── 4. SYNTHESISE ──────────────────────────────────────
    // Every template renders before anything is written.
    const generatedAt = this.stamp();
    const rendered: ReportArtifact[] = [];
    for (const templateId of templateIds) {
      rendered.push(
        await this.synthesizer.synthesize(sheet, templateId, locale, {
          jobId: job.id,
          period: spec.period,
          generatedAt,
        }),
      );
    }

    if (this.jobs.get(job.id)?.cancelRequested) {
      throw new JobCancelled('Cancelled before writing reports');
    }

    // ── 5. WRITE ───────────────────────────────────────────
    const refs: ArtifactRef[] = [];
    for (const artifact of rendered) {
      refs.push(await this.deps.sink.writeArtifact(artifact));
    }
    return refs;
  }

  private async handleFailure(jobId: string, attempt: number, raw: unknown, log: Logger): Promise<void> {
    const err = classifyError(raw);

    if (err instanceof JobCancelled) {
      this.finish(jobId, 'Cancelled', attempt);
      log.info(`Stopped: ${err.message}`);
      return;
    }

    let diagnosticRef: string | undefined;
    if (err.snapshot) {
      try {
        diagnosticRef = await this.deps.sink.writeDiagnostic(jobId, attempt, err.snapshot);
      } catch (writeErr) {
        log.error('Could not save the page snapshot', writeErr);
      }
    }

    const info: JobErrorInfo = { kind: err.kind, message: err.message, diagnosticRef };
    this.emit(jobId, { type: 'error', at: this.stamp(), attempt, error: info });

    const retriesUsed = attempt - 1;
    if (err.transient && retriesUsed < this.deps.config.maxRetries && !this.closed) {
      const delayMs = backoffDelay(attempt, this.deps.config.backoffBaseMs, this.deps.config.backoffCapMs);
      this.emit(jobId, { type: 'retry-scheduled', at: this.stamp(), attempt, delayMs, error: info });
      this.emit(jobId, { type: 'status', at: this.stamp(), status: 'Retrying', attempt });
      log.warn(`${err.kind} on attempt ${attempt}; retry ${retriesUsed + 1}/${this.deps.config.maxRetries} in ${delayMs} ms`);

      const timer = setTimeout(() => {
        this.retryTimers.delete(jobId);
        if (this.closed) return;
        this.pool.push(jobId, () => this.runJob(jobId));
      }, delayMs);
      this.retryTimers.set(jobId, timer);
      return;
    }

    if (err.transient) {
      log.error(`${err.kind} on attempt ${attempt}; no retries left (${this.deps.config.maxRetries} allowed)`);
    } else {
      log.error(`${err.kind}: ${err.message}`);
    }
    this.finish(jobId, 'Failed', attempt);
  }

  // ── Bookkeeping ──────────────────────────────────────────

  private localeFor(spec: JobSpec): Locale {
    const locale = spec.locale ?? this.deps.config.defaultLocale;
    if (!isLocale(locale)) {
      throw new TemplateError(`No report templates exist for locale "${locale}"`);
    }
    return locale;
  }

  private finish(jobId: string, status: 'Completed' | 'Failed' | 'Cancelled', attempt: number): void {
    this.emit(jobId, { type: 'status', at: this.stamp(), status, attempt });

    const job = this.jobs.get(jobId);
    if (job && this.inFlight.get(job.fingerprint) === jobId) {
      this.inFlight.delete(job.fingerprint);
    }
    if (this.inFlight.size === 0) {
      const waiters = this.settleWaiters;
      this.settleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  /** Update the live view now; append to the store in order per job. */
  private emit(jobId: string, event: JobEvent): void {
    const next = applyJobEvent(this.jobs.get(jobId), event);
    if (next) this.jobs.set(jobId, next);

    const previous = this.writes.get(jobId) ?? Promise.resolve();
    const write = previous
      .then(() => this.store.record(jobId, event))
      .catch((err: unknown) => {
        logger.error(`Could not record ${event.type} event for job ${short(jobId)}`, err);
      });
    this.writes.set(jobId, write);
  }

  private async flush(jobId: string): Promise<void> {
    await this.writes.get(jobId);
  }

  private async flushAll(): Promise<void> {
    await Promise.all(this.writes.values());
  }

  private stamp(): string {
    return this.now().toISOString();
  }
}

// ── Factory ────────────────────────────────────────────────

/** Wire an orchestrator from configuration: browser driver, templates, sink and store. */
export async function createOrchestrator(
  credentials: CredentialProvider,
  config: PipelineConfig = loadPipelineConfig(),
): Promise<ScrapeOrchestrator> {
  const templates = await TemplateRegistry.fromDirectory(config.templatesDir);
  let store: JobResultStore = new InMemoryJobStore();
  if (config.jobStore === 'supabase') {
    store = new SupabaseJobStore(
      config.supabaseUrl && config.supabaseKey
        ? createClient(config.supabaseUrl, config.supabaseKey)
        : undefined,
    );
  }

  const driver = new PuppeteerPortalDriver({
    baseUrl: config.portalBaseUrl,
    stepTimeoutMs: config.stepTimeoutMs,
    rateLimitMs: config.rateLimitMs,
    chromePath: config.chromePath,
    headless: config.headless,
    locale: config.defaultLocale,
  });

  logger.info(
    `Pipeline ready: ${config.poolSize} worker(s), up to ${config.maxRetries} retr${config.maxRetries === 1 ? 'y' : 'ies'}, ` +
      `${config.jobStore} job store, templates ${templates.list().join(', ') || '(none)'}`,
  );

  return new ScrapeOrchestrator({ driver, credentials, templates, sink: new FileArtifactSink(config.outputDir), store, config });
}

function short(id: string): string {
  return id.slice(0, 8);
}
