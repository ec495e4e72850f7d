/**
 * Vision Types - timeline data and chart configuration for deadline-lens
 */

import type { DeadlineStatus, StreamId, Timestamp } from '@deadline-lens/shared';

/**
 * Chart layout and palette
 */
export interface TimelineChartConfig {
  /** Image width in pixels (default: 1200) */
  width: number;
  /** Image height in pixels (default: 600) */
  height: number;
  backgroundColor: string;
  gridColor: string;
  textColor: string;
  /** Cumulative-drop line color */
  lineColor: string;
  lineWidth: number;
  padding: { top: number; right: number; bottom: number; left: number };
  /** Lanes beyond this are summarized as "+N more" */
  maxLanes: number;
}

/**
 * One gap observation on the cumulative-drop curve
 */
export interface DropPoint {
  time: Timestamp;
  streamId: StreamId;
  bytes: number;
  cumulativeBytes: number;
}

/**
 * One stream's deadline window, from set time to completion
 */
export interface StreamLane {
  streamId: StreamId;
  start: Timestamp;
  /** Completion time, when it does not precede `start` */
  end?: Timestamp;
  /** start + deadlineMs */
  deadlineEnd?: Timestamp;
  isHard: boolean;
  status: DeadlineStatus;
}

export interface TimelineSeries {
  drops: DropPoint[];
  lanes: StreamLane[];
  startTime: Timestamp;
  endTime: Timestamp;
  totalBytesDropped: number;
}
