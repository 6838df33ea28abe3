/**
 * extractionMachine.ts — One job attempt against the portal, as an explicit
 * state machine.
 *
 *   Init → Authenticating → Navigating → SelectingPeriod → ExtractingTable
 *        → Parsing → Completed
 *
 * Any non-terminal state may move to Failed, or to Retrying when the portal
 * bounced us to the sign-in page.  Retrying renews the session once and
 * resumes from Navigating; a second bounce in the same run fails it.
 *
 * Cancellation is only looked at between steps.  A step that is running is
 * always allowed to finish (or time out).
 */

import type { Session, SessionManager } from './sessionManager';
import {
  JobCancelled,
  LayoutChanged,
  NavigationTimeout,
  PipelineError,
  SessionExpired,
} from '../core/errors';
import type { DiagnosticSnapshot } from '../core/errors';
import { Logger } from '../core/logger';
import type { ClassContext, Credential, ExtractionResult, Locale, RawTable } from '../core/types';
import { validateExtraction } from '../middleware/extractionValidator';
import type { OpenedClass } from '../scrapers/portalDriver';

export type MachineState =
  | 'Init'
  | 'Authenticating'
  | 'Navigating'
  | 'SelectingPeriod'
  | 'ExtractingTable'
  | 'Parsing'
  | 'Completed'
  | 'Failed'
  | 'Retrying';

export const MACHINE_TRANSITIONS: Readonly<Record<MachineState, readonly MachineState[]>> = {
  Init: ['Authenticating', 'Failed', 'Retrying'],
  Authenticating: ['Navigating', 'Failed', 'Retrying'],
  Navigating: ['SelectingPeriod', 'Failed', 'Retrying'],
  SelectingPeriod: ['ExtractingTable', 'Failed', 'Retrying'],
  ExtractingTable: ['Parsing', 'Failed', 'Retrying'],
  Parsing: ['Completed', 'Failed', 'Retrying'],
  Retrying: ['Navigating', 'Failed'],
  Completed: [],
  Failed: [],
};

export function canTransition(from: MachineState, to: MachineState): boolean {
  return MACHINE_TRANSITIONS[from].includes(to);
}

export interface ExtractionTarget {
  classId: string;
  period: string;
  locale: Locale;
}

export interface MachineHooks {
  onTransition?: (from: MachineState, to: MachineState) => void;
  /** A SessionExpired that the machine handled itself. */
  onRecovered?: (err: PipelineError) => void;
  /** Polled between steps. */
  isCancelled?: () => boolean;
}

export interface MachineOptions {
  /** Upper bound on one portal step, all of its page waits included. */
  stepBudgetMs: number;
  /** First calendar year of the academic year, for dated columns. */
  startYear: number;
  logger?: Logger;
}

export class ExtractionMachine {
  private current: MachineState = 'Init';
  private readonly logger: Logger;

  constructor(
    private readonly sessions: SessionManager,
    private readonly credential: Credential,
    private readonly target: ExtractionTarget,
    private readonly options: MachineOptions,
    private readonly hooks: MachineHooks = {},
  ) {
    this.logger = options.logger ?? new Logger('ExtractionMachine');
  }

  get state(): MachineState {
    return this.current;
  }

  /** Drive the portal from Init to Completed.  Runs once per instance. */
  async run(): Promise<ExtractionResult> {
    if (this.current !== 'Init') {
      throw new Error(`Extraction machine already ran (state ${this.current})`);
    }

    let session: Session | undefined;
    try {
      this.step('Authenticating');
      session = await this.sessions.acquire(this.credential, this.target.locale);

      const { opened, periodLabel, table } = await this.extract(session);

      this.step('Parsing');
      const context: ClassContext = {
        className: opened.className,
        subject: opened.subject,
        schoolName: session.profile.schoolName,
        teacherName: session.profile.teacherName,
        periodLabel,
      };
      const result = validateExtraction(table, context, {
        startYear: this.options.startYear,
      });

      this.step('Completed');
      return result;
    } catch (err) {
      if (session && err instanceof LayoutChanged && !err.snapshot) {
        err.snapshot = await this.captureSnapshot(session);
      }
      if (session && (err instanceof SessionExpired || err instanceof NavigationTimeout)) {
        await this.sessions.invalidate(session);
      }
      if (!(err instanceof JobCancelled)) this.moveTo('Failed');
      throw err;
    } finally {
      if (session) this.sessions.release(session);
    }
  }

  // ── Steps ──────────────────────────────────────────────

  private async extract(
    session: Session,
  ): Promise<{ opened: OpenedClass; periodLabel: string; table: RawTable }> {
    let renewed = false;

    for (;;) {
      try {
        this.step('Navigating');
        const opened = await this.bounded('Navigating', session.context.openClass(this.target.classId));

        this.step('SelectingPeriod');
        const periodLabel = await this.bounded(
          'SelectingPeriod',
          session.context.selectPeriod(this.target.period),
        );

        this.step('ExtractingTable');
        const table = await this.bounded('ExtractingTable', session.context.readTable());
        this.logger.info(`Read ${table.rows.length} row(s) from "${periodLabel || this.target.period}"`);

        return { opened, periodLabel, table };
      } catch (err) {
        if (!(err instanceof SessionExpired) || renewed) throw err;

        renewed = true;
        this.logger.warn(`Session expired during ${this.current}: ${err.message}`);
        this.moveTo('Retrying');
        this.hooks.onRecovered?.(err);
        await this.sessions.renew(session, this.credential);
      }
    }
  }

  /** Cancellation checkpoint plus transition. */
  private step(next: MachineState): void {
    if (this.hooks.isCancelled?.()) {
      throw new JobCancelled(`Cancelled before ${next}`);
    }
    this.moveTo(next);
  }

  private moveTo(next: MachineState): void {
    const from = this.current;
    if (!canTransition(from, next)) {
      throw new Error(`Illegal extraction transition ${from} → ${next}`);
    }
    this.current = next;
    this.logger.debug(`${from} → ${next}`);
    this.hooks.onTransition?.(from, next);
  }

  /** Race a step against the step timeout. */
  private bounded<T>(step: string, work: Promise<T>): Promise<T> {
    const ms = this.options.stepBudgetMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new NavigationTimeout(`${step} did not finish within ${ms} ms`)),
        ms,
      );
    });

    return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
  }

  private async captureSnapshot(session: Session): Promise<DiagnosticSnapshot | undefined> {
    try {
      return await session.context.snapshot(this.current);
    } catch (err) {
      this.logger.warn(`Could not capture page state: ${String(err)}`);
      return undefined;
    }
  }
}
