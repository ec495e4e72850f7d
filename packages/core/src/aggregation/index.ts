/**
 * Aggregation Layer
 * Per-run stream state shared by both input sources
 */

export { StreamStateAggregator } from './stream-state-aggregator.js';
