/**
 * middleware/index.ts — Barrel export for the middleware layer.
 */

// ── Rate limiting ───────────────────────────────────────────
export { HostRateLimiter } from './rateLimiter';
export type { RateLimiterOptions } from './rateLimiter';

// ── Extraction validator ────────────────────────────────────
export { validateExtraction, detectColumns } from './extractionValidator';
