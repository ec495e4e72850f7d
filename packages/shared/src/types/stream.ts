/**
 * Stream Types for deadline-lens
 * Per-stream deadline facts reconstructed from client logs and QLOG traces
 */

/**
 * Non-negative integer stream identifier, unique across one analysis run
 */
export type StreamId = number;

/**
 * Milliseconds since run start. Clock-style inputs are converted at the
 * extraction boundary; see `parseClock` / `formatClock`.
 */
export type Timestamp = number;

/**
 * Everything known about one stream. The three fact groups (deadline,
 * drops, completion) are independent and may each be missing.
 */
export interface StreamRecord {
  streamId: StreamId;

  // Deadline facts (last writer wins)
  deadlineMs?: number;
  isHard?: boolean;
  setTime?: Timestamp;

  // Completion facts
  completed: boolean;
  completionTime?: Timestamp;

  // Additive counters, never overwritten
  bytesDropped: number;
  blockedEvents: number;
}

/**
 * One observed data drop attributable to deadline expiry
 */
export interface GapEvent {
  readonly streamId: StreamId;
  readonly bytesDropped: number;
  readonly time: Timestamp;
}

/**
 * A deadline-related QLOG event, retained verbatim for downstream inspection
 */
export interface DeadlineTraceEvent {
  readonly time: Timestamp;
  readonly type: string;
  readonly rawPayload: Readonly<Record<string, unknown>>;
}

/**
 * Finalized aggregator state. Immutable once produced.
 */
export interface AggregatorSnapshot {
  readonly records: ReadonlyMap<StreamId, Readonly<StreamRecord>>;
  readonly gaps: readonly GapEvent[];
  readonly deadlineTraces: readonly DeadlineTraceEvent[];
  /** DeadlineSet events that replaced an earlier, different deadline */
  readonly overwrittenDeadlines: number;
}

export interface AggregateMetrics {
  totalStreams: number;
  streamsWithDeadlines: number;
  hardDeadlines: number;
  softDeadlines: number;

  deadlinesMet: number;
  deadlinesMissed: number;
  deadlinesUndecidable: number;
  avgDeadlineMargin: number;
  minDeadlineMargin: number;
  maxDeadlineMargin: number;
  deadlineComplianceRate: number;

  streamsWithDrops: number;
  totalBytesDropped: number;
  totalBlockedEvents: number;
  gapEventCount: number;
  deadlineTraceEventCount: number;

  completedStreams: number;
  completionRate: number;
}

/**
 * Outcome of comparing a stream's completion duration with its deadline
 */
export type DeadlineStatus = 'met' | 'missed' | 'unknown' | 'n/a';
