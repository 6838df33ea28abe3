import { DEFAULT_CONFIG, loadPipelineConfig } from '../../core/config';
import { EnvCredentialProvider } from '../../services/envCredentials';
import { backoffDelay, jobFingerprint } from '../../scrapeOrchestrator';

describe('loadPipelineConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadPipelineConfig({})).toEqual({
      ...DEFAULT_CONFIG,
      chromePath: undefined,
      supabaseUrl: undefined,
      supabaseKey: undefined,
    });
  });

  it('reads overrides', () => {
    const config = loadPipelineConfig({
      PORTAL_BASE_URL: 'https://portal.test/',
      PORTAL_HEADLESS: 'false',
      POOL_SIZE: '4',
      MAX_RETRIES: '0',
      DEFAULT_LOCALE: 'kk',
      DEFAULT_TEMPLATES: 'grades-sheet, grades-brief,',
      JOB_STORE: 'supabase',
    });

    expect(config.portalBaseUrl).toBe('https://portal.test');
    expect(config.headless).toBe(false);
    expect(config.poolSize).toBe(4);
    expect(config.maxRetries).toBe(0);
    expect(config.defaultLocale).toBe('kk');
    expect(config.defaultTemplates).toEqual(['grades-sheet', 'grades-brief']);
    expect(config.jobStore).toBe('supabase');
  });

  it('rejects values out of range', () => {
    expect(() => loadPipelineConfig({ POOL_SIZE: '0' })).toThrow('POOL_SIZE must be an integer >= 1, got "0"');
    expect(() => loadPipelineConfig({ BACKOFF_BASE_MS: 'soon' })).toThrow('BACKOFF_BASE_MS');
    expect(() => loadPipelineConfig({ DEFAULT_LOCALE: 'en' })).toThrow('DEFAULT_LOCALE must be "ru" or "kk", got "en"');
    expect(() => loadPipelineConfig({ JOB_STORE: 'redis' })).toThrow('JOB_STORE');
  });
});

describe('backoffDelay', () => {
  it('doubles from the base up to the cap', () => {
    expect([1, 2, 3, 4, 5, 6, 7].map((n) => backoffDelay(n, 2_000, 60_000))).toEqual([
      2_000, 4_000, 8_000, 16_000, 32_000, 60_000, 60_000,
    ]);
  });
});

describe('jobFingerprint', () => {
  it('ignores locale and templates', () => {
    const base = { schoolId: 's', classId: '411', period: '2', credentialRef: 'a' };
    expect(jobFingerprint(base)).toBe(jobFingerprint({ ...base }));
    expect(jobFingerprint(base)).not.toBe(jobFingerprint({ ...base, period: '3' }));
  });
});

describe('EnvCredentialProvider', () => {
  const provider = new EnvCredentialProvider({
    PORTAL_LOGIN: 'teacher01',
    PORTAL_PASSWORD: 'test-secret',
    PORTAL_LOGIN_LYCEUM2: 'teacher02',
    PORTAL_PASSWORD_LYCEUM2: 'test-secret-2',
    PORTAL_SCHOOL_LYCEUM2: 'Лицей №2',
    PORTAL_LOGIN_HALF: 'teacher03',
  });

  it('resolves the default and suffixed logins', async () => {
    expect(await provider.resolve('default')).toEqual({ ref: 'default', username: 'teacher01', secret: 'test-secret' });
    expect(await provider.resolve('lyceum2')).toEqual({
      ref: 'lyceum2',
      username: 'teacher02',
      secret: 'test-secret-2',
      school: 'Лицей №2',
    });
  });

  it('skips logins without a password', async () => {
    expect(await provider.resolve('half')).toBeUndefined();
    expect(provider.refs()).toEqual(['default', 'lyceum2']);
  });
});
