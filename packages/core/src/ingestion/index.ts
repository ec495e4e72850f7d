/**
 * Ingestion Layer
 * Event extraction from client logs and QLOG trace documents
 */

export * from './types.js';
export { LogExtractor, classifyLine, extractLineTime, splitLines } from './log-extractor.js';
export { TraceExtractor, classifyEnvelope } from './trace-extractor.js';
