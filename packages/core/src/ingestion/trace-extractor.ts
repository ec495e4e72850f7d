/**
 * Trace Extractor
 * Reads QLOG trace documents into deadline-trace and stream-blocked events
 */

import { z } from 'zod';
import { createChildLogger, describeError, logFileFailed, TraceParseError } from '@deadline-lens/shared';
import type {
  TraceEnvelope,
  TraceEvent,
  TraceEventData,
  TraceExtractionResult,
} from './types.js';

const STREAM_BLOCKED_TYPE = 'stream_data_blocked';

const timeSchema = z.union([
  z.number().finite(),
  z
    .string()
    .regex(/^-?\d+(?:\.\d+)?$/, 'time must be numeric')
    .transform(Number),
]);

const eventDataSchema = z.object({ type: z.string() }).passthrough();

const streamIdSchema = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().nonnegative().refine(Number.isSafeInteger, 'stream id out of range'));

// [time, ..., data] -> { time, data }
const envelopeSchema = z
  .array(z.unknown())
  .min(2, 'event tuple needs a time and an event-data object')
  .transform((tuple, ctx): TraceEnvelope => {
    const time = timeSchema.safeParse(tuple[0]);
    if (!time.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'event time must be a number', path: [0] });
      return z.NEVER;
    }

    const lastIndex = tuple.length - 1;
    const data = eventDataSchema.safeParse(tuple[lastIndex]);
    if (!data.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'event data must be an object with a string type',
        path: [lastIndex],
      });
      return z.NEVER;
    }

    return { time: time.data, data: data.data };
  });

const traceGroupSchema = z.object({
  events: z.array(envelopeSchema),
});

// Only the first trace group is read, so only the first is validated
const traceDocumentSchema = z.object({
  traces: z.tuple([traceGroupSchema]).rest(z.unknown()),
});

function formatZodIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Events carried by one envelope, in emission order
 */
export function classifyEnvelope(envelope: TraceEnvelope): TraceEvent[] {
  const { time, data } = envelope;
  const events: TraceEvent[] = [];

  if (data.type.toLowerCase().includes('deadline')) {
    events.push({
      kind: 'deadline_trace',
      event: { time, type: data.type, rawPayload: data },
    });
  }

  if (data.type === STREAM_BLOCKED_TYPE) {
    const streamId = parseStreamId(data);
    if (streamId !== undefined) {
      events.push({ kind: 'stream_blocked', streamId });
    }
  }

  return events;
}

function parseStreamId(data: TraceEventData): number | undefined {
  const parsed = streamIdSchema.safeParse(data.stream_id);
  return parsed.success ? parsed.data : undefined;
}

export class TraceExtractor {
  private logger = createChildLogger({ component: 'TraceExtractor' });

  /**
   * Parse a raw QLOG document into typed envelopes.
   * Throws TraceParseError for malformed JSON or an unexpected shape.
   */
  parseDocument(raw: string, filePath: string): TraceEnvelope[] {
    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new TraceParseError(filePath, `invalid JSON (${describeError(error)})`);
    }

    const parsed = traceDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new TraceParseError(filePath, `unexpected structure (${formatZodIssues(parsed.error)})`);
    }

    return parsed.data.traces[0].events;
  }

  /**
   * Lazily yield the events carried by a sequence of envelopes
   */
  *events(envelopes: Iterable<TraceEnvelope>): Generator<TraceEvent> {
    for (const envelope of envelopes) {
      yield* classifyEnvelope(envelope);
    }
  }

  /**
   * Extract all events from one trace document. A document that cannot be
   * parsed is reported and contributes zero events.
   */
  extract(raw: string, filePath: string): TraceExtractionResult {
    let envelopes: TraceEnvelope[];
    try {
      envelopes = this.parseDocument(raw, filePath);
    } catch (error) {
      if (error instanceof TraceParseError) {
        logFileFailed(filePath, 'trace', error.reason);
        return { filePath, events: [], envelopeCount: 0, error };
      }
      throw error;
    }

    const events = Array.from(this.events(envelopes));

    this.logger.debug({
      filePath,
      envelopeCount: envelopes.length,
      eventCount: events.length,
    }, 'Trace extraction complete');

    return { filePath, events, envelopeCount: envelopes.length };
  }
}
