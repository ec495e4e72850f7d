/**
 * @deadline-lens/vision
 *
 * Server-side rendering of the run timeline: stream deadline windows and
 * cumulative dropped bytes.
 */

// Types
export * from './types.js';

// Timeline data
export { buildTimelineSeries, buildDropSeries, buildStreamLanes } from './timeline/timeline-series.js';

// Chart rendering
export {
  renderTimelineChart,
  renderTimelinePng,
  hexToRgba,
  STATUS_COLORS,
  type TimelineChartOptions,
} from './chart/timeline-chart.js';
