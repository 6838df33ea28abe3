/**
 * envCredentials.ts — CredentialProvider backed by environment variables.
 *
 * The default login lives in PORTAL_LOGIN / PORTAL_PASSWORD (optionally
 * PORTAL_SCHOOL).  Further logins use a suffix that becomes the reference:
 *
 *   PORTAL_LOGIN_LYCEUM2=...  PORTAL_PASSWORD_LYCEUM2=...   →  ref "lyceum2"
 */

import type { Credential, CredentialProvider } from '../core/types';

export const DEFAULT_CREDENTIAL_REF = 'default';

export class EnvCredentialProvider implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(ref: string): Promise<Credential | undefined> {
    const suffix = ref === DEFAULT_CREDENTIAL_REF ? '' : `_${ref.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
    const username = this.env[`PORTAL_LOGIN${suffix}`];
    const secret = this.env[`PORTAL_PASSWORD${suffix}`];
    if (!username || !secret) return undefined;

    const school = this.env[`PORTAL_SCHOOL${suffix}`];
    return { ref, username, secret, ...(school ? { school } : {}) };
  }

  /** References that have both a login and a password set. */
  refs(): string[] {
    const refs: string[] = [];
    for (const key of Object.keys(this.env)) {
      const match = /^PORTAL_LOGIN(?:_(.+))?$/.exec(key);
      if (!match) continue;
      const suffix = match[1];
      if (!this.env[suffix ? `PORTAL_PASSWORD_${suffix}` : 'PORTAL_PASSWORD']) continue;
      refs.push(suffix ? suffix.toLowerCase() : DEFAULT_CREDENTIAL_REF);
    }
    return refs.sort();
  }
}
