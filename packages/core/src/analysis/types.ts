/**
 * Analysis Layer Types
 */

import type {
  AggregateMetrics,
  AggregatorSnapshot,
  InputKind,
  LogReadError,
  TraceParseError,
} from '@deadline-lens/shared';
import type { DeadlineEvaluations } from '../metrics/metrics-calculator.js';

export interface AnalysisInput {
  logDir: string;
  traceDir?: string;
}

export interface AnalysisRunnerConfig {
  logExtensions: readonly string[];
  traceExtensions: readonly string[];
  readConcurrency: number;
}

export interface DiscoveredInputs {
  logs: string[];
  traces: string[];
}

/**
 * A file that contributed no events to the run
 */
export interface InputFailure {
  kind: InputKind;
  filePath: string;
  reason: string;
  error: LogReadError | TraceParseError;
}

export interface AnalysisResult {
  snapshot: AggregatorSnapshot;
  metrics: AggregateMetrics;
  /** Per-stream deadline evaluations the metrics were computed from */
  evaluations: DeadlineEvaluations;
  files: DiscoveredInputs;
  failures: InputFailure[];
  eventCounts: Record<InputKind, number>;
}
