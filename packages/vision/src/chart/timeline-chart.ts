/**
 * Timeline Chart Renderer - stream deadline lanes over a cumulative-drop curve
 */

import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import {
  RenderError,
  createChildLogger,
  describeError,
  formatClock,
  getConfig,
  type AggregatorSnapshot,
  type DeadlineStatus,
  type Timestamp,
} from '@deadline-lens/shared';
import { buildTimelineSeries } from '../timeline/timeline-series.js';
import type { DropPoint, StreamLane, TimelineChartConfig, TimelineSeries } from '../types.js';

type CanvasRenderingContext2D = SKRSContext2D;

interface Area {
  x: number;
  y: number;
  width: number;
  height: number;
}

const logger = createChildLogger({ component: 'TimelineChart' });

export const STATUS_COLORS: Record<DeadlineStatus, string> = {
  met: '#3fb950',
  missed: '#f85149',
  unknown: '#d29922',
  'n/a': '#58a6ff',
};

const DEFAULT_CHART_CONFIG: TimelineChartConfig = {
  width: 1200,
  height: 600,
  backgroundColor: '#12171f',
  gridColor: '#1e2733',
  textColor: '#7d8590',
  lineColor: '#f85149',
  lineWidth: 2,
  padding: { top: 40, right: 24, bottom: 36, left: 72 },
  maxLanes: 40,
};

/** Share of the plot height given to the lane band */
const LANE_BAND_RATIO = 0.6;

export interface TimelineChartOptions extends Partial<TimelineChartConfig> {
  title?: string;
  /** Border radius for panel */
  borderRadius?: number;
}

/**
 * Resolves size from the timeline config section, then explicit options
 */
function resolveConfig(options: TimelineChartOptions): TimelineChartConfig {
  const { timeline } = getConfig();
  return {
    ...DEFAULT_CHART_CONFIG,
    width: timeline.width,
    height: timeline.height,
    ...options,
  };
}

function isSeries(input: TimelineSeries | AggregatorSnapshot): input is TimelineSeries {
  return 'lanes' in input && 'drops' in input;
}

/**
 * Draw a rounded rectangle
 */
function drawRoundedRect(
  ctx: CanvasRenderingContext2D,
  x: number,
  y: number,
  width: number,
  height: number,
  radius: number
): void {
  const r = Math.min(radius, width / 2, height / 2);
  ctx.beginPath();
  ctx.moveTo(x + r, y);
  ctx.lineTo(x + width - r, y);
  ctx.quadraticCurveTo(x + width, y, x + width, y + r);
  ctx.lineTo(x + width, y + height - r);
  ctx.quadraticCurveTo(x + width, y + height, x + width - r, y + height);
  ctx.lineTo(x + r, y + height);
  ctx.quadraticCurveTo(x, y + height, x, y + height - r);
  ctx.lineTo(x, y + r);
  ctx.quadraticCurveTo(x, y, x + r, y);
  ctx.closePath();
}

/**
 * Renders the run timeline: one lane per stream (set time to completion,
 * colored by deadline status, with a tick at the deadline) above the
 * cumulative dropped-bytes curve.
 */
export function renderTimelineChart(
  input: TimelineSeries | AggregatorSnapshot,
  options: TimelineChartOptions = {}
): Canvas {
  const config = resolveConfig(options);
  const series = isSeries(input) ? input : buildTimelineSeries(input);
  const canvas = createCanvas(config.width, config.height);
  const ctx = canvas.getContext('2d');

  drawRoundedRect(ctx, 0, 0, config.width, config.height, options.borderRadius ?? 12);
  ctx.fillStyle = config.backgroundColor;
  ctx.fill();
  ctx.strokeStyle = config.gridColor;
  ctx.lineWidth = 1;
  ctx.stroke();

  drawTitle(ctx, options.title ?? 'Stream Timeline', config);

  const plot: Area = {
    x: config.padding.left,
    y: config.padding.top,
    width: config.width - config.padding.left - config.padding.right,
    height: config.height - config.padding.top - config.padding.bottom,
  };
  const laneArea: Area = { ...plot, height: plot.height * LANE_BAND_RATIO };
  const dropArea: Area = {
    ...plot,
    y: plot.y + laneArea.height + 8,
    height: plot.height - laneArea.height - 8,
  };

  const toX = timeScale(series, plot);

  drawGrid(ctx, plot, config);
  drawTimeAxis(ctx, plot, series, toX, config);
  drawLanes(ctx, laneArea, series.lanes, toX, config);
  drawDropCurve(ctx, dropArea, series.drops, series.endTime, toX, config);

  logger.debug(
    { lanes: series.lanes.length, drops: series.drops.length, width: config.width, height: config.height },
    'Timeline chart rendered'
  );

  return canvas;
}

/**
 * Renders the timeline and encodes it as PNG
 */
export function renderTimelinePng(
  input: TimelineSeries | AggregatorSnapshot,
  options: TimelineChartOptions = {}
): Buffer {
  try {
    return renderTimelineChart(input, options).toBuffer('image/png');
  } catch (err) {
    if (err instanceof RenderError) {
      throw err;
    }
    throw new RenderError(`Failed to render timeline chart: ${describeError(err)}`);
  }
}

function timeScale(series: TimelineSeries, area: Area): (time: Timestamp) => number {
  const span = series.endTime - series.startTime || 1;
  return (time) => area.x + ((time - series.startTime) / span) * area.width;
}

function drawTitle(ctx: CanvasRenderingContext2D, title: string, config: TimelineChartConfig): void {
  ctx.fillStyle = config.textColor;
  ctx.font = 'bold 14px Arial';
  ctx.textAlign = 'left';
  ctx.fillText(title, config.padding.left, 24);
}

function drawGrid(ctx: CanvasRenderingContext2D, area: Area, config: TimelineChartConfig): void {
  ctx.strokeStyle = config.gridColor;
  ctx.lineWidth = 0.5;

  for (let i = 0; i <= 4; i++) {
    const x = area.x + (area.width / 4) * i;
    ctx.globalAlpha = i === 2 ? 0.4 : 0.2;
    ctx.beginPath();
    ctx.moveTo(x, area.y);
    ctx.lineTo(x, area.y + area.height);
    ctx.stroke();
  }
  ctx.globalAlpha = 1;

  ctx.strokeStyle = '#2d333b';
  ctx.lineWidth = 1;
  ctx.beginPath();
  ctx.moveTo(area.x, area.y + area.height);
  ctx.lineTo(area.x + area.width, area.y + area.height);
  ctx.stroke();
}

function drawTimeAxis(
  ctx: CanvasRenderingContext2D,
  area: Area,
  series: TimelineSeries,
  toX: (time: Timestamp) => number,
  config: TimelineChartConfig
): void {
  ctx.fillStyle = config.textColor;
  ctx.font = '10px Arial';
  ctx.textAlign = 'center';

  const span = series.endTime - series.startTime;
  for (let i = 0; i <= 4; i++) {
    const time = series.startTime + (span / 4) * i;
    ctx.fillText(formatClock(time), toX(time), area.y + area.height + 16);
  }
}

function drawLanes(
  ctx: CanvasRenderingContext2D,
  area: Area,
  lanes: StreamLane[],
  toX: (time: Timestamp) => number,
  config: TimelineChartConfig
): void {
  if (lanes.length === 0) {
    ctx.fillStyle = config.textColor;
    ctx.font = '12px Arial';
    ctx.textAlign = 'center';
    ctx.fillText('No deadline windows', area.x + area.width / 2, area.y + area.height / 2);
    return;
  }

  const shown = lanes.slice(0, config.maxLanes);
  const hidden = lanes.length - shown.length;
  const slots = shown.length + (hidden > 0 ? 1 : 0);
  const laneHeight = area.height / slots;
  const barHeight = Math.max(2, laneHeight * 0.6);

  ctx.font = '10px Arial';
  shown.forEach((lane, index) => {
    const top = area.y + laneHeight * index + (laneHeight - barHeight) / 2;
    const color = STATUS_COLORS[lane.status];
    const startX = toX(lane.start);
    const endX = lane.end !== undefined ? toX(lane.end) : area.x + area.width;

    ctx.fillStyle = config.textColor;
    ctx.textAlign = 'right';
    ctx.fillText(`#${lane.streamId}`, area.x - 8, top + barHeight / 2 + 3);

    ctx.globalAlpha = lane.end !== undefined ? 0.85 : 0.35;
    drawRoundedRect(ctx, startX, top, Math.max(endX - startX, 2), barHeight, 3);
    ctx.fillStyle = color;
    ctx.fill();
    ctx.globalAlpha = 1;

    if (lane.deadlineEnd !== undefined) {
      const deadlineX = toX(lane.deadlineEnd);
      ctx.strokeStyle = lane.isHard ? '#e6edf3' : config.textColor;
      ctx.lineWidth = lane.isHard ? 2 : 1;
      ctx.beginPath();
      ctx.moveTo(deadlineX, top - 2);
      ctx.lineTo(deadlineX, top + barHeight + 2);
      ctx.stroke();
    }
  });

  if (hidden > 0) {
    ctx.fillStyle = config.textColor;
    ctx.textAlign = 'left';
    ctx.fillText(`+${hidden} more`, area.x, area.y + laneHeight * shown.length + laneHeight / 2 + 3);
  }
}

/**
 * Step curve of cumulative dropped bytes with a gradient fill
 */
function drawDropCurve(
  ctx: CanvasRenderingContext2D,
  area: Area,
  drops: DropPoint[],
  endTime: Timestamp,
  toX: (time: Timestamp) => number,
  config: TimelineChartConfig
): void {
  const last = drops[drops.length - 1];
  const total = last ? last.cumulativeBytes : 0;

  ctx.fillStyle = config.textColor;
  ctx.font = '10px Arial';
  ctx.textAlign = 'right';
  ctx.fillText(formatBytes(total), area.x - 8, area.y + 8);
  ctx.fillText('0', area.x - 8, area.y + area.height);

  if (!last || total === 0) {
    return;
  }

  const toY = (bytes: number): number => area.y + area.height - (bytes / total) * area.height;
  const baseline = area.y + area.height;

  const outline = (): void => {
    ctx.moveTo(area.x, baseline);
    let previousY = baseline;
    for (const point of drops) {
      const x = toX(point.time);
      ctx.lineTo(x, previousY);
      previousY = toY(point.cumulativeBytes);
      ctx.lineTo(x, previousY);
    }
    ctx.lineTo(toX(endTime), previousY);
  };

  const gradient = ctx.createLinearGradient(0, area.y, 0, baseline);
  gradient.addColorStop(0, hexToRgba(config.lineColor, 0.25));
  gradient.addColorStop(0.5, hexToRgba(config.lineColor, 0.1));
  gradient.addColorStop(1, hexToRgba(config.lineColor, 0.02));

  ctx.fillStyle = gradient;
  ctx.beginPath();
  outline();
  ctx.lineTo(toX(endTime), baseline);
  ctx.closePath();
  ctx.fill();

  ctx.save();
  ctx.shadowColor = config.lineColor;
  ctx.shadowBlur = 6;
  ctx.strokeStyle = config.lineColor;
  ctx.lineWidth = config.lineWidth;
  ctx.lineJoin = 'round';
  ctx.beginPath();
  outline();
  ctx.stroke();
  ctx.restore();
}

/**
 * Convert hex color to rgba
 */
export function hexToRgba(hex: string, alpha: number): string {
  const result = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(hex);
  if (result?.[1] && result[2] && result[3]) {
    const r = parseInt(result[1], 16);
    const g = parseInt(result[2], 16);
    const b = parseInt(result[3], 16);
    return `rgba(${r}, ${g}, ${b}, ${alpha})`;
  }
  return hex;
}

function formatBytes(value: number): string {
  if (value >= 1000000) {
    return (value / 1000000).toFixed(1) + 'M';
  }
  if (value >= 1000) {
    return (value / 1000).toFixed(1) + 'K';
  }
  return value.toString();
}
