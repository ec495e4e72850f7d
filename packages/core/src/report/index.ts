/**
 * Report Layer
 */

export {
  renderReport,
  buildStreamRows,
  buildMetricsDocument,
  formatPercent,
  formatMargin,
  formatBytes,
  type ReportOptions,
  type StreamRow,
  type MetricsDocument,
} from './report-renderer.js';
