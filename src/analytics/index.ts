export * from './types/metrics.js';
export * from './core/analytics-service.js';
export * from './queries/metrics-queries.js';
export * from './utils/timestamps.js';
