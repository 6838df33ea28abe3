/**
 * sessionManager.ts — Per-credential authenticated browsing contexts.
 *
 * Lifecycle of one credential's session:
 *
 *   acquire ──► (lock) ──► valid session? ──yes──► hand it out
 *                              │no
 *                              ▼
 *                       new context + login ──► hand it out
 *
 *   release     returns the session; the lock passes to the next waiter.
 *   invalidate  closes the context; the next acquire logs in again.
 *   renew       re-logs in a session the caller still holds (after the
 *               portal bounced a step to the sign-in page).
 *
 * The lock is held from acquire until release, so only one worker drives a
 * credential's page at any time.  Different credentials never wait on each
 * other.
 */

import { randomUUID } from 'crypto';
import { AuthError, PipelineError } from '../core/errors';
import { Logger, maskLogin } from '../core/logger';
import type { Credential, Locale } from '../core/types';
import type { PortalContext, PortalDriver, PortalProfile } from '../scrapers/portalDriver';

const logger = new Logger('SessionManager');

export interface Session {
  readonly id: string;
  readonly credentialRef: string;
  valid: boolean;
  /** Successful sign-ins on this session, first login included. */
  loginCount: number;
  locale: Locale;
  profile: PortalProfile;
  readonly context: PortalContext;
}

export interface SessionManagerOptions {
  /** Sign-in attempts before AuthError (the first try plus retries). */
  loginAttempts: number;
}

export interface SessionStats {
  /** Calls to `PortalContext.login`, failed ones included. */
  loginCalls: number;
  liveSessions: number;
}

interface CredentialEntry {
  lock: CredentialLock;
  session?: Session;
}

export class SessionManager {
  private readonly entries = new Map<string, CredentialEntry>();
  private readonly unlocks = new Map<string, () => void>();
  private loginCalls = 0;

  constructor(
    private readonly driver: PortalDriver,
    private readonly options: SessionManagerOptions,
  ) {}

  // ── Public API ───────────────────────────────────────────

  /**
   * Wait for the credential's lock, then return its live session, logging
   * in first when there is none.  Throws AuthError when the portal rejects
   * the login on every attempt.
   */
  async acquire(credential: Credential, locale: Locale): Promise<Session> {
    const entry = this.entryFor(credential.ref);
    const unlock = await entry.lock.acquire();

    try {
      const session = await this.ensureSession(entry, credential, locale);
      this.unlocks.set(session.id, unlock);
      return session;
    } catch (err) {
      unlock();
      throw err;
    }
  }

  /** Hand the session back without closing it. */
  release(session: Session): void {
    const unlock = this.unlocks.get(session.id);
    if (!unlock) {
      logger.warn(`Release of session ${shortId(session.id)} that is not held`);
      return;
    }
    this.unlocks.delete(session.id);
    unlock();
  }

  /** Close the session's context.  The holder still has to `release` it. */
  async invalidate(session: Session): Promise<void> {
    if (!session.valid && this.entries.get(session.credentialRef)?.session !== session) return;

    session.valid = false;
    const entry = this.entries.get(session.credentialRef);
    if (entry?.session === session) entry.session = undefined;

    logger.info(`Invalidated session ${shortId(session.id)} for "${session.credentialRef}"`);
    await closeQuietly(session.context);
  }

  /** Log a held session back in on its existing context. */
  async renew(session: Session, credential: Credential): Promise<void> {
    if (!this.unlocks.has(session.id)) {
      throw new Error(`Session ${shortId(session.id)} must be held to be renewed`);
    }
    logger.warn(`Renewing session ${shortId(session.id)} for ${maskLogin(credential.username)}`);
    session.valid = false;
    session.profile = await this.login(session.context, credential, session.locale);
    session.valid = true;
    session.loginCount++;
  }

  /** Close every session.  Used on shutdown. */
  async closeAll(): Promise<void> {
    const sessions = [...this.entries.values()]
      .map((e) => e.session)
      .filter((s): s is Session => s !== undefined);

    await Promise.all(sessions.map((s) => this.invalidate(s)));
    logger.info(`Closed ${sessions.length} session(s)`);
  }

  stats(): SessionStats {
    let liveSessions = 0;
    for (const entry of this.entries.values()) {
      if (entry.session?.valid) liveSessions++;
    }
    return { loginCalls: this.loginCalls, liveSessions };
  }

  // ── Internals ────────────────────────────────────────────

  private entryFor(ref: string): CredentialEntry {
    let entry = this.entries.get(ref);
    if (!entry) {
      entry = { lock: new CredentialLock() };
      this.entries.set(ref, entry);
    }
    return entry;
  }

  private async ensureSession(
    entry: CredentialEntry,
    credential: Credential,
    locale: Locale,
  ): Promise<Session> {
    const current = entry.session;
    if (current?.valid && (await this.switchLanguage(current, locale))) {
      logger.debug(`Reusing session ${shortId(current.id)} for "${credential.ref}"`);
      return current;
    }

    if (current) await this.invalidate(current);

    const context = await this.driver.newContext(credential.ref);
    let profile: PortalProfile;
    try {
      profile = await this.login(context, credential, locale);
    } catch (err) {
      await closeQuietly(context);
      throw err;
    }

    const session: Session = {
      id: randomUUID(),
      credentialRef: credential.ref,
      valid: true,
      loginCount: 1,
      locale,
      profile,
      context,
    };
    entry.session = session;
    logger.info(`Session ${shortId(session.id)} ready for ${maskLogin(credential.username)}`);
    return session;
  }

  /**
   * Bring a reused session to the job's interface language.  Returns false
   * when the portal no longer accepts the session; the caller logs in anew.
   */
  private async switchLanguage(session: Session, locale: Locale): Promise<boolean> {
    if (session.locale === locale) return true;
    try {
      await session.context.setLanguage(locale);
    } catch (err) {
      logger.warn(
        `Session ${shortId(session.id)} failed to switch to "${locale}", signing in again: ${describe(err)}`,
      );
      return false;
    }
    session.locale = locale;
    return true;
  }

  /**
   * Sign in, retrying a rejected login up to `loginAttempts` times.  A
   * transient failure on the last attempt (the sign-in page not loading)
   * is rethrown as is so the orchestrator can back off and retry.
   */
  private async login(
    context: PortalContext,
    credential: Credential,
    locale: Locale,
  ): Promise<PortalProfile> {
    const attempts = Math.max(1, this.options.loginAttempts);
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      this.loginCalls++;
      try {
        return await context.login(credential, locale);
      } catch (err) {
        lastError = err;
        logger.warn(
          `Login attempt ${attempt}/${attempts} for ${maskLogin(credential.username)} failed: ${describe(err)}`,
        );
      }
    }

    if (lastError instanceof PipelineError && lastError.transient) throw lastError;
    if (lastError instanceof AuthError) throw lastError;
    throw new AuthError(
      `Login for ${maskLogin(credential.username)} failed after ${attempts} attempt(s): ${describe(lastError)}`,
      { cause: lastError },
    );
  }
}

/**
 * FIFO mutex built from a promise chain.  `acquire` resolves with the
 * function that hands the lock to the next waiter.
 */
export class CredentialLock {
  private tail: Promise<void> = Promise.resolve();

  acquire(): Promise<() => void> {
    let unlock: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const ready = this.tail.then(() => unlock);
    this.tail = this.tail.then(() => released);
    return ready;
  }
}

async function closeQuietly(context: PortalContext): Promise<void> {
  try {
    await context.close();
  } catch (err) {
    logger.warn(`Browsing context did not close cleanly: ${describe(err)}`);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function shortId(id: string): string {
  return id.slice(0, 8);
}
