export * from './errors';
export * from './config';
export { createLogger, configureLogging, closeLogging } from './logging';
export type { Logger, LogLevel } from './logging';
export { TokenManager, createTokenManager } from './auth/token-manager';
export { getAuthorizationUrl, exchangeCodeForToken } from './auth/authorization-flow';
export type { TokenPair, TokensRefreshedEvent } from './auth/types';
export { ZohoBooksClient } from './zoho/http/client';
export { RateWindow, MAX_REQUESTS_PER_WINDOW, RATE_WINDOW_MS } from './zoho/http/rate-window';
export { FreshBooksClient } from './freshbooks/http/client';
export { FreshBooksReader } from './freshbooks/resources';
export { IdMappingRegistry, DedupIndex } from './migration/id-registry';
export type { EntityKind } from './migration/id-registry';
export { MigrationResult, formatStageSummary, formatRunReport } from './migration/result';
export type { RunReport, StageSummary } from './migration/result';
export { MigrationPipeline, STAGE_ORDER, STAGE_LABELS } from './migration/pipeline';
export type { StageName } from './migration/pipeline';
export { createMigrationRuntime } from './migration/runtime';
export type { MigrationRuntime, RuntimeOptions } from './migration/runtime';
export * from './mappers';
