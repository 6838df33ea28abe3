/**
 * portalDriver.ts — The seam between the extraction state machine and a
 * browser.
 *
 * A `PortalDriver` hands out browsing contexts; each `PortalContext` is one
 * isolated set of cookies and one page.  Every method maps onto a single
 * state-machine step and throws a classified `PipelineError` when the page
 * does not look as expected:
 *
 *   login          → AuthError, NavigationTimeout
 *   openClass      → SessionExpired, NavigationTimeout, LayoutChanged
 *   selectPeriod   → SessionExpired, NavigationTimeout, LayoutChanged
 *   readTable      → SessionExpired, NavigationTimeout
 */

import type { DiagnosticSnapshot } from '../core/errors';
import type { Credential, Locale, RawTable } from '../core/types';

/** What a successful login tells us about the account. */
export interface PortalProfile {
  teacherName: string;
  schoolName: string;
}

/** The class/subject row a job opened. */
export interface OpenedClass {
  className: string;
  subject: string;
}

export interface PortalContext {
  /** Sign in and verify the profile marker.  Rejections throw AuthError. */
  login(credential: Credential, locale: Locale): Promise<PortalProfile>;
  /** Switch the interface language of an already signed-in context. */
  setLanguage(locale: Locale): Promise<void>;
  /** Open the criteria page of a row on the grades list. */
  openClass(classId: string): Promise<OpenedClass>;
  /** Activate the tab for a period; returns the label of the tab chosen. */
  selectPeriod(period: string): Promise<string>;
  /** Read the active tab's table verbatim. */
  readTable(): Promise<RawTable>;
  /** Capture page state for a failure report. */
  snapshot(step: string): Promise<DiagnosticSnapshot>;
  close(): Promise<void>;
}

export interface PortalDriver {
  newContext(credentialRef: string): Promise<PortalContext>;
  /** Release the browser itself. */
  close(): Promise<void>;
}
