/**
 * config.ts — Central configuration, read from environment variables with defaults.
 *
 * Backoff and retry numbers are deployment-tuned; nothing in the pipeline
 * hard-codes them.
 */

import type { Locale } from './types';
import { isLocale } from './types';

export type JobStoreKind = 'memory' | 'supabase';

export interface PipelineConfig {
  // Portal
  portalBaseUrl: string;
  chromePath?: string;
  headless: boolean;
  /** Upper bound on every wait inside a state-machine step. */
  stepTimeoutMs: number;
  /** Minimum spacing between portal navigations. */
  rateLimitMs: number;
  loginAttempts: number;

  // Orchestrator
  poolSize: number;
  maxRetries: number;
  backoffBaseMs: number;
  backoffCapMs: number;

  // Reports
  outputDir: string;
  templatesDir: string;
  defaultLocale: Locale;
  defaultTemplates: string[];

  // Result store
  jobStore: JobStoreKind;
  supabaseUrl?: string;
  supabaseKey?: string;
}

export const DEFAULT_CONFIG: PipelineConfig = {
  portalBaseUrl: 'https://mektep.edu.kz',
  headless: true,
  stepTimeoutMs: 15_000,
  rateLimitMs: 1_500,
  loginAttempts: 2,
  poolSize: 2,
  maxRetries: 3,
  backoffBaseMs: 2_000,
  backoffCapMs: 60_000,
  outputDir: 'out',
  templatesDir: 'templates',
  defaultLocale: 'ru',
  defaultTemplates: ['grades-sheet'],
  jobStore: 'memory',
};

/** Build a PipelineConfig from process.env with defaults. */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
): PipelineConfig {
  const locale = env.DEFAULT_LOCALE ?? DEFAULT_CONFIG.defaultLocale;
  if (!isLocale(locale)) {
    throw new Error(`DEFAULT_LOCALE must be "ru" or "kk", got "${locale}"`);
  }

  const jobStore = env.JOB_STORE ?? DEFAULT_CONFIG.jobStore;
  if (jobStore !== 'memory' && jobStore !== 'supabase') {
    throw new Error(`JOB_STORE must be "memory" or "supabase", got "${jobStore}"`);
  }

  return {
    portalBaseUrl: (env.PORTAL_BASE_URL ?? DEFAULT_CONFIG.portalBaseUrl).replace(/\/+$/, ''),
    chromePath: env.PORTAL_CHROME_PATH || undefined,
    headless: env.PORTAL_HEADLESS !== 'false',
    stepTimeoutMs: intFromEnv(env, 'STEP_TIMEOUT_MS', DEFAULT_CONFIG.stepTimeoutMs, 1),
    rateLimitMs: intFromEnv(env, 'RATE_LIMIT_MS', DEFAULT_CONFIG.rateLimitMs, 0),
    loginAttempts: intFromEnv(env, 'LOGIN_ATTEMPTS', DEFAULT_CONFIG.loginAttempts, 1),
    poolSize: intFromEnv(env, 'POOL_SIZE', DEFAULT_CONFIG.poolSize, 1),
    maxRetries: intFromEnv(env, 'MAX_RETRIES', DEFAULT_CONFIG.maxRetries, 0),
    backoffBaseMs: intFromEnv(env, 'BACKOFF_BASE_MS', DEFAULT_CONFIG.backoffBaseMs, 0),
    backoffCapMs: intFromEnv(env, 'BACKOFF_CAP_MS', DEFAULT_CONFIG.backoffCapMs, 0),
    outputDir: env.OUTPUT_DIR ?? DEFAULT_CONFIG.outputDir,
    templatesDir: env.TEMPLATES_DIR ?? DEFAULT_CONFIG.templatesDir,
    defaultLocale: locale,
    defaultTemplates: env.DEFAULT_TEMPLATES
      ? env.DEFAULT_TEMPLATES.split(',').map((t) => t.trim()).filter(Boolean)
      : DEFAULT_CONFIG.defaultTemplates,
    jobStore,
    supabaseUrl: env.SUPABASE_URL || undefined,
    supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY || undefined,
  };
}

function intFromEnv(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}
