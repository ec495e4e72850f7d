/**
 * Analysis Layer
 * Drives one analysis run over a set of log and trace files
 */

export * from './types.js';
export { AnalysisRunner, runAnalysis } from './analysis-runner.js';
export { discoverFiles, readFileBatches, type ReadOutcome } from './file-discovery.js';
