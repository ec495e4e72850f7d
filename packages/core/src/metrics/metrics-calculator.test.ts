/**
 * Metrics Calculator Tests
 */
import { describe, it, expect } from 'vitest';
import type { StreamRecord } from '@deadline-lens/shared';
import { computeMetrics, evaluateDeadline, evaluateStreams } from './metrics-calculator.js';
import { StreamStateAggregator } from '../aggregation/stream-state-aggregator.js';
import { LogExtractor } from '../ingestion/log-extractor.js';

function record(overrides: Partial<StreamRecord> & Pick<StreamRecord, 'streamId'>): StreamRecord {
  return { completed: false, bytesDropped: 0, blockedEvents: 0, ...overrides };
}

function snapshotOf(records: StreamRecord[]) {
  return {
    records: new Map(records.map((r) => [r.streamId, r])),
    gaps: [],
    deadlineTraces: [],
  };
}

describe('evaluateDeadline()', () => {
  it('should report met with the margin', () => {
    const evaluation = evaluateDeadline(
      record({ streamId: 1, deadlineMs: 100, setTime: 0, completed: true, completionTime: 80 })
    );
    expect(evaluation).toEqual({ status: 'met', durationMs: 80, marginMs: 20 });
  });

  it('should count an exact hit as met', () => {
    const evaluation = evaluateDeadline(
      record({ streamId: 1, deadlineMs: 100, setTime: 0, completed: true, completionTime: 100 })
    );
    expect(evaluation).toEqual({ status: 'met', durationMs: 100, marginMs: 0 });
  });

  it('should report missed past the deadline', () => {
    const evaluation = evaluateDeadline(
      record({ streamId: 1, deadlineMs: 50, setTime: 0, completed: true, completionTime: 80 })
    );
    expect(evaluation).toEqual({ status: 'missed', durationMs: 80 });
  });

  it('should be n/a without a deadline', () => {
    expect(evaluateDeadline(record({ streamId: 1, completionTime: 80 }))).toEqual({ status: 'n/a' });
  });

  it('should be unknown without a completion time', () => {
    expect(evaluateDeadline(record({ streamId: 1, deadlineMs: 100, setTime: 0 }))).toEqual({
      status: 'unknown',
    });
  });

  it('should be unknown when completion precedes the set time', () => {
    expect(
      evaluateDeadline(record({ streamId: 1, deadlineMs: 100, setTime: 1000, completionTime: 0 }))
    ).toEqual({ status: 'unknown' });
  });
});

describe('computeMetrics()', () => {
  it('should return zeros for an empty run', () => {
    const metrics = computeMetrics(snapshotOf([]));

    expect(metrics.totalStreams).toBe(0);
    expect(metrics.deadlineComplianceRate).toBe(0);
    expect(metrics.avgDeadlineMargin).toBe(0);
    expect(metrics.completionRate).toBe(0);
  });

  it('should not fail when no record carries a deadline', () => {
    const metrics = computeMetrics(snapshotOf([record({ streamId: 1, completed: true, completionTime: 5 })]));

    expect(metrics.streamsWithDeadlines).toBe(0);
    expect(metrics.deadlineComplianceRate).toBe(0);
    expect(metrics.avgDeadlineMargin).toBe(0);
    expect(metrics.completionRate).toBe(1);
  });

  it('should aggregate a mixed run', () => {
    const metrics = computeMetrics({
      records: new Map([
        [1, record({ streamId: 1, deadlineMs: 100, isHard: true, setTime: 0, completed: true, completionTime: 80 })],
        [2, record({ streamId: 2, deadlineMs: 200, isHard: false, setTime: 0, completed: true, completionTime: 140 })],
        [3, record({ streamId: 3, deadlineMs: 50, isHard: true, setTime: 0, completed: true, completionTime: 80, bytesDropped: 300 })],
        [4, record({ streamId: 4, deadlineMs: 100, setTime: 0, blockedEvents: 2 })],
        [5, record({ streamId: 5, bytesDropped: 40 })],
      ]),
      gaps: [
        { streamId: 3, bytesDropped: 300, time: 60 },
        { streamId: 5, bytesDropped: 40, time: 70 },
      ],
      deadlineTraces: [{ time: 1, type: 'deadline_set', rawPayload: {} }],
    });

    expect(metrics).toEqual({
      totalStreams: 5,
      streamsWithDeadlines: 4,
      hardDeadlines: 2,
      softDeadlines: 2,
      deadlinesMet: 2,
      deadlinesMissed: 1,
      deadlinesUndecidable: 1,
      avgDeadlineMargin: 40,
      minDeadlineMargin: 20,
      maxDeadlineMargin: 60,
      deadlineComplianceRate: 0.5,
      streamsWithDrops: 2,
      totalBytesDropped: 340,
      totalBlockedEvents: 2,
      gapEventCount: 2,
      deadlineTraceEventCount: 1,
      completedStreams: 3,
      completionRate: 0.6,
    });
  });

  it('should treat a sentinel completion time as undecidable end to end', () => {
    const aggregator = new StreamStateAggregator();
    aggregator.applyAll(
      new LogExtractor().extractText(
        [
          '[00:00:01] Set deadline on stream 4: 100 ms (hard)',
          '[00:00:03] Stream 4: Dropped 20 bytes due to deadline',
          'Stream 4 completed',
        ].join('\n')
      )
    );
    const snapshot = aggregator.finalize();

    expect(snapshot.records.get(4)).toEqual({
      streamId: 4,
      deadlineMs: 100,
      isHard: true,
      setTime: 1000,
      bytesDropped: 20,
      blockedEvents: 0,
      completed: true,
      completionTime: 0,
    });

    const metrics = computeMetrics(snapshot);
    expect(metrics.totalStreams).toBe(1);
    expect(metrics.streamsWithDeadlines).toBe(1);
    expect(metrics.hardDeadlines).toBe(1);
    expect(metrics.streamsWithDrops).toBe(1);
    expect(metrics.totalBytesDropped).toBe(20);
    expect(metrics.completionRate).toBe(1);
    expect(metrics.deadlinesMet).toBe(0);
    expect(metrics.deadlinesUndecidable).toBe(1);
  });

  it('should handle runs with hundreds of thousands of met deadlines', () => {
    const count = 300_000;
    const records: StreamRecord[] = [];
    for (let id = 0; id < count; id++) {
      const completionTime = 1000 + (id % 2 === 0 ? 50 : 70);
      records.push(record({ streamId: id, deadlineMs: 100, setTime: 1000, completed: true, completionTime }));
    }

    const metrics = computeMetrics(snapshotOf(records));

    expect(metrics.deadlinesMet).toBe(count);
    expect(metrics.minDeadlineMargin).toBe(30);
    expect(metrics.maxDeadlineMargin).toBe(50);
    expect(metrics.avgDeadlineMargin).toBe(40);
    expect(metrics.deadlineComplianceRate).toBe(1);
  });

  it('should count from the evaluations it is given', () => {
    const snapshot = snapshotOf([
      record({ streamId: 1, deadlineMs: 100, setTime: 0, completed: true, completionTime: 80 }),
      record({ streamId: 2, deadlineMs: 100, setTime: 0, completed: true, completionTime: 90 }),
    ]);
    const evaluations = evaluateStreams(snapshot);
    evaluations.set(2, { status: 'missed', durationMs: 120 });

    const metrics = computeMetrics(snapshot, evaluations);

    expect(metrics.deadlinesMet).toBe(1);
    expect(metrics.deadlinesMissed).toBe(1);
    expect(metrics.avgDeadlineMargin).toBe(20);
  });
});
