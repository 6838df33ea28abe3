/**
 * agents/index.ts — Barrel export for the stateful layer.
 *
 * `middleware/` holds stateless helpers (column detection, rate limiting).
 * `agents/` holds the modules that own state across a job:
 *   • Session Manager    — one logged-in context per credential, reused
 *   • Extraction Machine — per-job state machine over the portal steps
 *   • Worker Pool        — bounded FIFO of job runners
 */

export { SessionManager, CredentialLock } from './sessionManager';
export type { Session, SessionManagerOptions, SessionStats } from './sessionManager';

export { ExtractionMachine, MACHINE_TRANSITIONS, canTransition } from './extractionMachine';
export type {
  ExtractionTarget,
  MachineHooks,
  MachineOptions,
  MachineState,
} from './extractionMachine';

export { WorkerPool } from './workerPool';
export type { PoolStats } from './workerPool';
