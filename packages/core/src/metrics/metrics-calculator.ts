/**
 * Metrics Calculator
 * Aggregate deadline, drop and completion statistics over a finalized run
 */

import type {
  AggregateMetrics,
  AggregatorSnapshot,
  DeadlineStatus,
  StreamId,
  StreamRecord,
} from '@deadline-lens/shared';

export interface DeadlineEvaluation {
  status: DeadlineStatus;
  /** completionTime - setTime, present only when decidable */
  durationMs?: number;
  /** deadlineMs - durationMs, present only when met */
  marginMs?: number;
}

/**
 * Compare one record's completion duration with its deadline.
 *
 * Records without a deadline are `n/a`. A missing timestamp, or a completion
 * that precedes the set time (e.g. a sentinel clock), is `unknown`: neither
 * met nor missed.
 */
export function evaluateDeadline(record: Readonly<StreamRecord>): DeadlineEvaluation {
  if (record.deadlineMs === undefined) {
    return { status: 'n/a' };
  }

  if (record.setTime === undefined || record.completionTime === undefined) {
    return { status: 'unknown' };
  }

  const durationMs = record.completionTime - record.setTime;
  if (durationMs < 0) {
    return { status: 'unknown' };
  }

  if (durationMs <= record.deadlineMs) {
    return { status: 'met', durationMs, marginMs: record.deadlineMs - durationMs };
  }

  return { status: 'missed', durationMs };
}

/** One evaluation per record, keyed by stream id */
export type DeadlineEvaluations = ReadonlyMap<StreamId, DeadlineEvaluation>;

/**
 * Evaluate every record once, so metrics and report rows share one result
 */
export function evaluateStreams(snapshot: Pick<AggregatorSnapshot, 'records'>): Map<StreamId, DeadlineEvaluation> {
  const evaluations = new Map<StreamId, DeadlineEvaluation>();
  for (const record of snapshot.records.values()) {
    evaluations.set(record.streamId, evaluateDeadline(record));
  }
  return evaluations;
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

/**
 * Pure: computes everything once from the finalized state, in a single
 * pass over the records.
 */
export function computeMetrics(
  snapshot: Pick<AggregatorSnapshot, 'records' | 'gaps' | 'deadlineTraces'>,
  evaluations: DeadlineEvaluations = evaluateStreams(snapshot)
): AggregateMetrics {
  let streamsWithDeadlines = 0;
  let hardDeadlines = 0;
  let softDeadlines = 0;
  let deadlinesMissed = 0;
  let deadlinesUndecidable = 0;
  let streamsWithDrops = 0;
  let totalBytesDropped = 0;
  let totalBlockedEvents = 0;
  let completedStreams = 0;
  let deadlinesMet = 0;
  let marginSum = 0;
  let minDeadlineMargin = Infinity;
  let maxDeadlineMargin = -Infinity;

  for (const record of snapshot.records.values()) {
    if (record.deadlineMs !== undefined) {
      streamsWithDeadlines++;
      if (record.isHard) {
        hardDeadlines++;
      } else {
        softDeadlines++;
      }
    }

    const evaluation = evaluations.get(record.streamId) ?? evaluateDeadline(record);
    switch (evaluation.status) {
      case 'met': {
        const margin = evaluation.marginMs ?? 0;
        deadlinesMet++;
        marginSum += margin;
        minDeadlineMargin = Math.min(minDeadlineMargin, margin);
        maxDeadlineMargin = Math.max(maxDeadlineMargin, margin);
        break;
      }
      case 'missed':
        deadlinesMissed++;
        break;
      case 'unknown':
        deadlinesUndecidable++;
        break;
      case 'n/a':
        break;
    }

    if (record.bytesDropped > 0) {
      streamsWithDrops++;
    }
    totalBytesDropped += record.bytesDropped;
    totalBlockedEvents += record.blockedEvents;

    if (record.completed) {
      completedStreams++;
    }
  }

  const totalStreams = snapshot.records.size;

  return {
    totalStreams,
    streamsWithDeadlines,
    hardDeadlines,
    softDeadlines,

    deadlinesMet,
    deadlinesMissed,
    deadlinesUndecidable,
    avgDeadlineMargin: ratio(marginSum, deadlinesMet),
    minDeadlineMargin: deadlinesMet > 0 ? minDeadlineMargin : 0,
    maxDeadlineMargin: deadlinesMet > 0 ? maxDeadlineMargin : 0,
    deadlineComplianceRate: ratio(deadlinesMet, streamsWithDeadlines),

    streamsWithDrops,
    totalBytesDropped,
    totalBlockedEvents,
    gapEventCount: snapshot.gaps.length,
    deadlineTraceEventCount: snapshot.deadlineTraces.length,

    completedStreams,
    completionRate: ratio(completedStreams, totalStreams),
  };
}
