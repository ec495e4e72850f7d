/**
 * Timeline Series - projects a finalized run into chartable data
 */

import { evaluateDeadline } from '@deadline-lens/core';
import type { AggregatorSnapshot, Timestamp } from '@deadline-lens/shared';
import type { DropPoint, StreamLane, TimelineSeries } from '../types.js';

/**
 * Cumulative dropped bytes over time. Gaps with equal times keep their
 * observation order.
 */
export function buildDropSeries(snapshot: Pick<AggregatorSnapshot, 'gaps'>): DropPoint[] {
  const ordered = [...snapshot.gaps].sort((a, b) => a.time - b.time);
  let cumulativeBytes = 0;

  return ordered.map((gap) => {
    cumulativeBytes += gap.bytesDropped;
    return {
      time: gap.time,
      streamId: gap.streamId,
      bytes: gap.bytesDropped,
      cumulativeBytes,
    };
  });
}

/**
 * One lane per stream with a set time, by ascending stream id
 */
export function buildStreamLanes(snapshot: Pick<AggregatorSnapshot, 'records'>): StreamLane[] {
  const lanes: StreamLane[] = [];

  for (const record of snapshot.records.values()) {
    if (record.setTime === undefined) {
      continue;
    }

    const start = record.setTime;
    const lane: StreamLane = {
      streamId: record.streamId,
      start,
      isHard: record.isHard ?? false,
      status: evaluateDeadline(record).status,
    };
    if (record.completionTime !== undefined && record.completionTime >= start) {
      lane.end = record.completionTime;
    }
    if (record.deadlineMs !== undefined) {
      lane.deadlineEnd = start + record.deadlineMs;
    }
    lanes.push(lane);
  }

  return lanes.sort((a, b) => a.streamId - b.streamId);
}

export function buildTimelineSeries(
  snapshot: Pick<AggregatorSnapshot, 'records' | 'gaps'>
): TimelineSeries {
  const drops = buildDropSeries(snapshot);
  const lanes = buildStreamLanes(snapshot);

  let startTime = Infinity;
  let endTime = -Infinity;
  const include = (time: Timestamp): void => {
    startTime = Math.min(startTime, time);
    endTime = Math.max(endTime, time);
  };

  for (const point of drops) {
    include(point.time);
  }
  for (const lane of lanes) {
    include(lane.start);
    if (lane.end !== undefined) include(lane.end);
    if (lane.deadlineEnd !== undefined) include(lane.deadlineEnd);
  }

  const last = drops[drops.length - 1];
  const empty = startTime === Infinity;

  return {
    drops,
    lanes,
    startTime: empty ? 0 : startTime,
    endTime: empty ? 0 : endTime,
    totalBytesDropped: last ? last.cumulativeBytes : 0,
  };
}
