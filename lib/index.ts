/**
 * Stock Rating Engine public API
 */

export * from './analysis/earnings-quality';
export * from './analysis/esg-risk';
export * from './analysis/fundamental';
export * from './analysis/indicators';
export * from './analysis/outcome';
export * from './analysis/sentiment';
export * from './analysis/technical';
export * from './errors';
export * from './intraday';
export * from './market-data/cache';
export * from './market-data/fmp-provider';
export * from './market-data/statements';
export * from './market-data/symbol-resolver';
export type * from './market-data/types';
export * from './rate-limiter';
export * from './scoring';
export * from './search';
export * from './stock-analyzer';
export * from './validators';
export { describeError, formatErrorResponse } from './utils';
export { ScoringConfig } from '../config/scoring-config';
export { loadAppConfig, type AppConfig } from '../config/app-config';
