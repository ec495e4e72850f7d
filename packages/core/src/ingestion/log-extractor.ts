/**
 * Log Extractor
 * Turns free-text client log lines into typed deadline events
 */

import { CLOCK_SENTINEL, createChildLogger, parseClock, type Timestamp } from '@deadline-lens/shared';
import type { LogEvent, LogLine } from './types.js';

// One alternation per line kind, so a line can only ever match one of them
const LINE_GRAMMAR = new RegExp(
  [
    String.raw`Set deadline on stream (?<setStream>\d+): (?<deadlineMs>\d+) ms \((?<tag>hard|soft)\)`,
    String.raw`Stream (?<dropStream>\d+): Dropped (?<bytes>\d+) bytes`,
    String.raw`Stream (?<doneStream>\d+) completed`,
  ].join('|')
);

// Optional bracketed clock token, anywhere in the line
const CLOCK_TOKEN = /\[(\d{2}:\d{2}:\d{2})\]/;

const UNMATCHED: LogLine = { kind: 'unmatched' };

function toSafeInteger(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Timestamp of a line: its `[HH:MM:SS]` token, or the sentinel
 */
export function extractLineTime(line: string): Timestamp {
  const match = CLOCK_TOKEN.exec(line);
  if (!match?.[1]) {
    return CLOCK_SENTINEL;
  }
  return parseClock(match[1]) ?? CLOCK_SENTINEL;
}

/**
 * Classify one log line in a single pass
 */
export function classifyLine(line: string): LogLine {
  const groups = LINE_GRAMMAR.exec(line)?.groups;
  if (!groups) {
    return UNMATCHED;
  }

  const time = extractLineTime(line);

  if (groups.setStream !== undefined) {
    const streamId = toSafeInteger(groups.setStream);
    const deadlineMs = toSafeInteger(groups.deadlineMs);
    if (streamId === undefined || deadlineMs === undefined) {
      return UNMATCHED;
    }
    return { kind: 'deadline_set', streamId, deadlineMs, isHard: groups.tag === 'hard', time };
  }

  if (groups.dropStream !== undefined) {
    const streamId = toSafeInteger(groups.dropStream);
    const bytes = toSafeInteger(groups.bytes);
    if (streamId === undefined || bytes === undefined) {
      return UNMATCHED;
    }
    return { kind: 'drop', streamId, bytes, time };
  }

  const streamId = toSafeInteger(groups.doneStream);
  if (streamId === undefined) {
    return UNMATCHED;
  }
  return { kind: 'completed', streamId, time };
}

/**
 * Split raw file contents into lines, tolerating CRLF endings
 */
export function splitLines(raw: string): string[] {
  return raw.split(/\r?\n/);
}

export class LogExtractor {
  private logger = createChildLogger({ component: 'LogExtractor' });

  /**
   * Lazily yield events for every recognized line; other lines are skipped
   */
  *extract(lines: Iterable<string>, source: string = 'unknown'): Generator<LogEvent> {
    let lineCount = 0;
    let eventCount = 0;

    for (const line of lines) {
      lineCount++;
      const classified = classifyLine(line);
      if (classified.kind === 'unmatched') {
        continue;
      }
      eventCount++;
      yield classified;
    }

    this.logger.debug({ source, lineCount, eventCount }, 'Log extraction complete');
  }

  /**
   * Extract all events from the full contents of one log file
   */
  extractText(raw: string, source: string = 'unknown'): LogEvent[] {
    return Array.from(this.extract(splitLines(raw), source));
  }
}
