/**
 * Stream State Aggregator
 * Folds log and trace events, keyed by stream id, into one record set per run
 */

import {
  AggregatorFinalizedError,
  createChildLogger,
  ValidationError,
  type AggregatorSnapshot,
  type DeadlineTraceEvent,
  type GapEvent,
  type StreamId,
  type StreamRecord,
  type Timestamp,
} from '@deadline-lens/shared';
import type { StreamEvent } from '../ingestion/types.js';

/**
 * Owns the per-run state: the record map and the two append-only sequences.
 *
 * Additive operations (`drop`, `streamBlocked`) are not idempotent: each
 * input file must be applied at most once per run.
 */
export class StreamStateAggregator {
  private logger = createChildLogger({ component: 'StreamStateAggregator' });
  private records = new Map<StreamId, StreamRecord>();
  private gaps: GapEvent[] = [];
  private deadlineTraces: DeadlineTraceEvent[] = [];
  private overwrittenDeadlines = 0;
  private snapshot: AggregatorSnapshot | null = null;

  /**
   * Record a stream's deadline. A later call for the same stream overwrites it.
   */
  deadlineSet(streamId: StreamId, deadlineMs: number, isHard: boolean, time: Timestamp): void {
    const record = this.recordFor(streamId, 'deadlineSet');

    if (
      record.deadlineMs !== undefined &&
      (record.deadlineMs !== deadlineMs || record.isHard !== isHard || record.setTime !== time)
    ) {
      this.overwrittenDeadlines++;
      this.logger.warn({
        streamId,
        previous: { deadlineMs: record.deadlineMs, isHard: record.isHard, setTime: record.setTime },
        next: { deadlineMs, isHard, setTime: time },
      }, 'Deadline overwritten by a later DeadlineSet');
    }

    record.deadlineMs = deadlineMs;
    record.isHard = isHard;
    record.setTime = time;
  }

  /**
   * Accumulate dropped bytes and append a gap observation
   */
  drop(streamId: StreamId, bytes: number, time: Timestamp): void {
    this.assertOpen('drop');
    if (!Number.isSafeInteger(bytes) || bytes < 0) {
      throw new ValidationError(`Dropped byte count must be a non-negative integer, got ${bytes}`, { streamId });
    }

    const record = this.recordFor(streamId, 'drop');
    record.bytesDropped += bytes;
    this.gaps.push(Object.freeze({ streamId, bytesDropped: bytes, time }));
  }

  completed(streamId: StreamId, time: Timestamp): void {
    const record = this.recordFor(streamId, 'completed');
    record.completed = true;
    record.completionTime = time;
  }

  streamBlocked(streamId: StreamId): void {
    const record = this.recordFor(streamId, 'streamBlocked');
    record.blockedEvents++;
  }

  /**
   * Retain a deadline trace event; no stream record is touched
   */
  deadlineTrace(event: DeadlineTraceEvent): void {
    this.assertOpen('deadlineTrace');
    this.deadlineTraces.push(Object.freeze({ ...event }));
  }

  /**
   * Dispatch one extracted event to its operation
   */
  apply(event: StreamEvent): void {
    switch (event.kind) {
      case 'deadline_set':
        this.deadlineSet(event.streamId, event.deadlineMs, event.isHard, event.time);
        break;
      case 'drop':
        this.drop(event.streamId, event.bytes, event.time);
        break;
      case 'completed':
        this.completed(event.streamId, event.time);
        break;
      case 'stream_blocked':
        this.streamBlocked(event.streamId);
        break;
      case 'deadline_trace':
        this.deadlineTrace(event.event);
        break;
    }
  }

  /**
   * Apply a sequence in order. Returns the number of events applied.
   */
  applyAll(events: Iterable<StreamEvent>): number {
    let count = 0;
    for (const event of events) {
      this.apply(event);
      count++;
    }
    return count;
  }

  getRecord(streamId: StreamId): Readonly<StreamRecord> | undefined {
    return this.records.get(streamId);
  }

  get streamCount(): number {
    return this.records.size;
  }

  get isFinalized(): boolean {
    return this.snapshot !== null;
  }

  /**
   * End the run. Records become immutable and further mutation throws.
   * Repeated calls return the same snapshot.
   */
  finalize(): AggregatorSnapshot {
    if (this.snapshot) {
      return this.snapshot;
    }

    for (const record of this.records.values()) {
      Object.freeze(record);
    }

    this.snapshot = Object.freeze({
      records: this.records,
      gaps: Object.freeze(this.gaps),
      deadlineTraces: Object.freeze(this.deadlineTraces),
      overwrittenDeadlines: this.overwrittenDeadlines,
    });

    this.logger.info({
      streams: this.records.size,
      gaps: this.gaps.length,
      deadlineTraces: this.deadlineTraces.length,
      overwrittenDeadlines: this.overwrittenDeadlines,
    }, 'Aggregator finalized');

    return this.snapshot;
  }

  private recordFor(streamId: StreamId, operation: string): StreamRecord {
    this.assertOpen(operation);

    if (!Number.isSafeInteger(streamId) || streamId < 0) {
      throw new ValidationError(`Stream id must be a non-negative integer, got ${streamId}`, { operation });
    }

    let record = this.records.get(streamId);
    if (!record) {
      record = {
        streamId,
        completed: false,
        bytesDropped: 0,
        blockedEvents: 0,
      };
      this.records.set(streamId, record);
    }
    return record;
  }

  private assertOpen(operation: string): void {
    if (this.snapshot) {
      throw new AggregatorFinalizedError(operation);
    }
  }
}
