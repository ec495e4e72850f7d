/**
 * Metrics Layer
 */

export {
  computeMetrics,
  evaluateDeadline,
  evaluateStreams,
  type DeadlineEvaluation,
  type DeadlineEvaluations,
} from './metrics-calculator.js';
