/**
 * @deadline-lens/core
 * Log/trace correlation and deadline metrics for deadline-aware streams
 */

// Ingestion Layer - text-log and QLOG event extraction
export * from './ingestion/index.js';

// Aggregation Layer - per-run stream state
export * from './aggregation/index.js';

// Metrics Layer - compliance, drop and completion statistics
export * from './metrics/index.js';

// Report Layer - plain-text and JSON projections
export * from './report/index.js';

// Analysis Layer - file discovery and the single forward pass
export * from './analysis/index.js';
