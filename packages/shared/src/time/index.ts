/**
 * Clock conversions between `HH:MM:SS` tokens and run-relative milliseconds
 */

import type { Timestamp } from '../types/stream.js';

/** `00:00:00`, substituted when a log line carries no usable clock token */
export const CLOCK_SENTINEL: Timestamp = 0;

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

const CLOCK_PATTERN = /^(\d{2}):(\d{2}):(\d{2})$/;

/**
 * Convert an `HH:MM:SS` string to milliseconds.
 * Returns undefined when the string is not a valid clock reading.
 */
export function parseClock(value: string): Timestamp | undefined {
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = Number(match[3]);

  if (minutes > 59 || seconds > 59) {
    return undefined;
  }

  return hours * MS_PER_HOUR + minutes * MS_PER_MINUTE + seconds * MS_PER_SECOND;
}

/**
 * Render milliseconds as `HH:MM:SS`, with a `.mmm` suffix only when the
 * value has a sub-second part
 */
export function formatClock(time: Timestamp): string {
  const total = Math.max(0, Math.round(time));
  const hours = Math.floor(total / MS_PER_HOUR);
  const minutes = Math.floor((total % MS_PER_HOUR) / MS_PER_MINUTE);
  const seconds = Math.floor((total % MS_PER_MINUTE) / MS_PER_SECOND);
  const millis = total % MS_PER_SECOND;

  const clock = [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
  return millis === 0 ? clock : `${clock}.${String(millis).padStart(3, '0')}`;
}
