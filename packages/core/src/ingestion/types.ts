/**
 * Ingestion Layer Types
 * Typed events extracted from client logs and QLOG trace documents
 */

import type { DeadlineTraceEvent, StreamId, Timestamp, TraceParseError } from '@deadline-lens/shared';

// ===========================================
// Stream Events
// ===========================================

export interface DeadlineSetEvent {
  kind: 'deadline_set';
  streamId: StreamId;
  deadlineMs: number;
  isHard: boolean;
  time: Timestamp;
}

export interface DropEvent {
  kind: 'drop';
  streamId: StreamId;
  bytes: number;
  time: Timestamp;
}

export interface CompletedEvent {
  kind: 'completed';
  streamId: StreamId;
  time: Timestamp;
}

export interface StreamBlockedEvent {
  kind: 'stream_blocked';
  streamId: StreamId;
}

export interface DeadlineTraceStreamEvent {
  kind: 'deadline_trace';
  event: DeadlineTraceEvent;
}

export type StreamEvent =
  | DeadlineSetEvent
  | DropEvent
  | CompletedEvent
  | StreamBlockedEvent
  | DeadlineTraceStreamEvent;

/** Events the text-log extractor can produce */
export type LogEvent = DeadlineSetEvent | DropEvent | CompletedEvent;

/** Events the trace extractor can produce */
export type TraceEvent = StreamBlockedEvent | DeadlineTraceStreamEvent;

// ===========================================
// Log Line Grammar
// ===========================================

/**
 * Result of classifying one log line. The recognized kinds are mutually
 * exclusive; everything else is `unmatched`.
 */
export type LogLine = LogEvent | { kind: 'unmatched' };

// ===========================================
// Trace Envelope
// ===========================================

/**
 * Positional `[time, ..., data]` QLOG tuple, reduced to its two meaningful parts
 */
export interface TraceEnvelope {
  time: Timestamp;
  data: TraceEventData;
}

export interface TraceEventData {
  type: string;
  stream_id?: unknown;
  [key: string]: unknown;
}

// ===========================================
// Results
// ===========================================

export interface TraceExtractionResult {
  filePath: string;
  events: TraceEvent[];
  envelopeCount: number;
  /** Set when the document could not be parsed; `events` is then empty */
  error?: TraceParseError;
}
