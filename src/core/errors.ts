/**
 * errors.ts — Classified failures raised by the pipeline.
 *
 * Every error the orchestrator acts on extends `PipelineError` and carries a
 * `kind` plus a `transient` flag.  Transient kinds are retried under the
 * orchestrator's backoff policy; everything else fails the job immediately.
 */

export type ErrorKind =
  | 'AuthError'
  | 'SessionExpired'
  | 'NavigationTimeout'
  | 'LayoutChanged'
  | 'PartialDataError'
  | 'TemplateError'
  | 'Cancelled'
  | 'Unexpected';

/** Page state captured when the portal stops looking like we expect. */
export interface DiagnosticSnapshot {
  step: string;
  url: string;
  /** First few KB of the page markup. */
  htmlExcerpt: string;
  capturedAt: string;
}

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly transient: boolean;
  snapshot?: DiagnosticSnapshot;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credential rejected, or the logged-in marker never appeared. */
export class AuthError extends PipelineError {
  readonly kind = 'AuthError';
  readonly transient = false;
}

/** A step landed on the login page: the portal dropped our session. */
export class SessionExpired extends PipelineError {
  readonly kind = 'SessionExpired';
  readonly transient = true;
}

/** An expected element did not appear within the step bound. */
export class NavigationTimeout extends PipelineError {
  readonly kind = 'NavigationTimeout';
  readonly transient = true;
}

/** The page loaded but its structure is not one we recognise. */
export class LayoutChanged extends PipelineError {
  readonly kind = 'LayoutChanged';
  readonly transient = false;

  constructor(message: string, snapshot?: DiagnosticSnapshot) {
    super(message);
    this.snapshot = snapshot;
  }
}

/** Some rows were incomplete.  Logged, never thrown out of a job. */
export class PartialDataError extends PipelineError {
  readonly kind = 'PartialDataError';
  readonly transient = false;

  constructor(
    message: string,
    readonly incompleteCount: number,
  ) {
    super(message);
  }
}

/** Requested template or locale variant is missing or malformed. */
export class TemplateError extends PipelineError {
  readonly kind = 'TemplateError';
  readonly transient = false;
}

/** Raised at a step boundary after `cancel()` was requested. */
export class JobCancelled extends PipelineError {
  readonly kind = 'Cancelled';
  readonly transient = false;
}

/** Anything the pipeline did not classify itself. */
export class UnexpectedError extends PipelineError {
  readonly kind = 'Unexpected';
  readonly transient = false;
}

/** Wrap a thrown value so callers can always read `kind` and `transient`. */
export function classifyError(err: unknown): PipelineError {
  if (err instanceof PipelineError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new UnexpectedError(message, { cause: err });
}
