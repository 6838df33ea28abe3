/**
 * index.ts — Public API of the scrape-and-report pipeline.
 */

export { ScrapeOrchestrator, createOrchestrator, backoffDelay, jobFingerprint } from './scrapeOrchestrator';
export type { CancelOutcome, OrchestratorConfig, OrchestratorDeps } from './scrapeOrchestrator';

export { DEFAULT_CONFIG, loadPipelineConfig } from './core/config';
export type { PipelineConfig, JobStoreKind } from './core/config';
export * from './core/errors';
export * from './core/types';
export { normalizeExtraction, parseGradeToken, formatGrade } from './core/recordNormalizer';

export * from './agents';
export * from './middleware';
export * from './scrapers';

export { TemplateRegistry } from './reports/templateRegistry';
export type { ReportTemplate } from './reports/templateRegistry';
export { ReportSynthesizer, renderDocument } from './reports/reportSynthesizer';
export { computeGradeStatistics } from './reports/gradeStatistics';
export type { GradeStatistics, GradeBand, Level } from './reports/gradeStatistics';
export { FileArtifactSink } from './reports/artifactSink';
export type { ArtifactSink } from './reports/artifactSink';

export { InMemoryJobStore, foldJobEvents } from './services/jobResultStore';
export type { JobResultStore } from './services/jobResultStore';
export { SupabaseJobStore } from './services/supabaseJobStore';
export { EnvCredentialProvider } from './services/envCredentials';
