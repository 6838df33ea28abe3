/**
 * logger.ts — Natural-language progress logger for the scrape pipeline.
 *
 * Every line carries an ISO timestamp, the level and the module that wrote it:
 *
 *   [2026-02-10T18:30:00.000Z] [INFO ] [Orchestrator] Job 3f2a… completed with 1 artifact(s)
 *
 * The threshold comes from LOG_LEVEL (debug | info | warn | error | silent)
 * and is read on every call so tests can silence output from a setup file.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('SessionManager');
 *   logger.info('Logged in as tea***, session 2 is ready');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Step-level chatter: selectors tried, rows skipped. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: session ready, table extracted, artifact written. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but non-fatal: dropped rows, incomplete records, retries. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: browser crash, layout change, template error. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err && isEnabled('error')) {
      console.error(err);
    }
  }

  /** A logger for a sub-component, e.g. `Orchestrator:job-12`. */
  child(suffix: string): Logger {
    return new Logger(`${this.context}:${suffix}`);
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string): void {
    if (!isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5);
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

function isEnabled(level: LogLevel): boolean {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  const threshold = isThresholdName(configured)
    ? LEVEL_RANK[configured]
    : LEVEL_RANK.info;
  return LEVEL_RANK[level] >= threshold;
}

function isThresholdName(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/** Mask a login for log output: "teacher01" → "tea***". */
export function maskLogin(login: string): string {
  return login.length <= 3 ? '***' : `${login.slice(0, 3)}***`;
}
