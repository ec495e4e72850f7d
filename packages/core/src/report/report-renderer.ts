/**
 * Report Renderer
 * Projects a finalized run and its metrics into a stable plain-text document
 */

import {
  formatClock,
  type AggregateMetrics,
  type AggregatorSnapshot,
  type DeadlineStatus,
  type StreamId,
  type StreamRecord,
} from '@deadline-lens/shared';
import type { DeadlineEvaluation, DeadlineEvaluations } from '../metrics/metrics-calculator.js';
import type { InputFailure } from '../analysis/types.js';

const DEFAULT_TITLE = 'Deadline Compliance Report';
const LABEL_WIDTH = 26;
const MISSING = '-';

const grouped = new Intl.NumberFormat('en-US');

export interface ReportOptions {
  title?: string;
  /** Per-file failures to list at the end of the report */
  failures?: readonly InputFailure[];
}

/**
 * One row of the per-stream table, also used for the metrics JSON document
 */
export interface StreamRow {
  streamId: StreamId;
  deadlineMs: number | null;
  type: 'hard' | 'soft' | null;
  setTime: string | null;
  completionTime: string | null;
  durationMs: number | null;
  status: DeadlineStatus;
  bytesDropped: number;
  blockedEvents: number;
}

interface Column {
  header: string;
  width: number;
  align: 'left' | 'right';
  value: (row: StreamRow) => string;
}

const COLUMNS: readonly Column[] = [
  { header: 'Stream', width: 6, align: 'right', value: (row) => String(row.streamId) },
  { header: 'Deadline', width: 9, align: 'right', value: (row) => formatMs(row.deadlineMs) },
  { header: 'Type', width: 4, align: 'left', value: (row) => row.type ?? MISSING },
  { header: 'Set At', width: 12, align: 'left', value: (row) => row.setTime ?? MISSING },
  { header: 'Done At', width: 12, align: 'left', value: (row) => row.completionTime ?? MISSING },
  { header: 'Duration', width: 9, align: 'right', value: (row) => formatMs(row.durationMs) },
  { header: 'Status', width: 7, align: 'left', value: (row) => row.status },
  { header: 'Dropped', width: 10, align: 'right', value: (row) => grouped.format(row.bytesDropped) },
  { header: 'Blocked', width: 7, align: 'right', value: (row) => String(row.blockedEvents) },
];

export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatMargin(ms: number): string {
  return `${ms.toFixed(1)} ms`;
}

export function formatBytes(bytes: number): string {
  return grouped.format(bytes);
}

function formatMs(ms: number | null): string {
  return ms === null ? MISSING : `${grouped.format(ms)} ms`;
}

function field(label: string, value: string | number): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function heading(title: string, underline: string = '-'): string[] {
  return [title, underline.repeat(title.length)];
}

// Only reached for a record missing from the evaluations it was rendered with
const UNEVALUATED: DeadlineEvaluation = { status: 'unknown' };

function toRow(record: Readonly<StreamRecord>, evaluations: DeadlineEvaluations): StreamRow {
  const evaluation = evaluations.get(record.streamId) ?? UNEVALUATED;
  let type: StreamRow['type'] = null;
  if (record.isHard !== undefined) {
    type = record.isHard ? 'hard' : 'soft';
  }

  return {
    streamId: record.streamId,
    deadlineMs: record.deadlineMs ?? null,
    type,
    setTime: record.setTime === undefined ? null : formatClock(record.setTime),
    completionTime: record.completionTime === undefined ? null : formatClock(record.completionTime),
    durationMs: evaluation.durationMs ?? null,
    status: evaluation.status,
    bytesDropped: record.bytesDropped,
    blockedEvents: record.blockedEvents,
  };
}

/**
 * Per-stream rows sorted by ascending stream id
 */
export function buildStreamRows(
  snapshot: Pick<AggregatorSnapshot, 'records'>,
  evaluations: DeadlineEvaluations
): StreamRow[] {
  return Array.from(snapshot.records.values())
    .sort((a, b) => a.streamId - b.streamId)
    .map((record) => toRow(record, evaluations));
}

function renderCell(column: Column, text: string): string {
  return column.align === 'right' ? text.padStart(column.width) : text.padEnd(column.width);
}

function renderTable(rows: readonly StreamRow[]): string[] {
  const header = COLUMNS.map((column) => renderCell(column, column.header)).join('  ').trimEnd();
  const lines = [header];

  if (rows.length === 0) {
    lines.push('(no streams observed)');
    return lines;
  }

  for (const row of rows) {
    lines.push(COLUMNS.map((column) => renderCell(column, column.value(row))).join('  ').trimEnd());
  }
  return lines;
}

/**
 * Format the report from already-computed metrics and per-stream
 * evaluations; nothing is recomputed here.
 */
export function renderReport(
  snapshot: AggregatorSnapshot,
  metrics: AggregateMetrics,
  evaluations: DeadlineEvaluations,
  options: ReportOptions = {}
): string {
  const title = options.title ?? DEFAULT_TITLE;
  const lines: string[] = [
    ...heading(title, '='),
    '',
    ...heading('Summary'),
    field('Total streams', metrics.totalStreams),
    field('Streams with deadlines', metrics.streamsWithDeadlines),
    field('  Hard deadlines', metrics.hardDeadlines),
    field('  Soft deadlines', metrics.softDeadlines),
    field('Overwritten deadlines', snapshot.overwrittenDeadlines),
    field('Deadline trace events', metrics.deadlineTraceEventCount),
    '',
    ...heading('Deadline Compliance'),
    field('Deadlines met', metrics.deadlinesMet),
    field('Deadlines missed', metrics.deadlinesMissed),
    field('Undecidable', metrics.deadlinesUndecidable),
    field('Compliance rate', formatPercent(metrics.deadlineComplianceRate)),
    field('Average margin', formatMargin(metrics.avgDeadlineMargin)),
    field('Margin range', `${metrics.minDeadlineMargin.toFixed(1)} - ${formatMargin(metrics.maxDeadlineMargin)}`),
    '',
    ...heading('Data Drops'),
    field('Streams with drops', metrics.streamsWithDrops),
    field('Total bytes dropped', formatBytes(metrics.totalBytesDropped)),
    field('Gap events', metrics.gapEventCount),
    field('Blocked events', metrics.totalBlockedEvents),
    '',
    ...heading('Completion'),
    field('Completed streams', metrics.completedStreams),
    field('Completion rate', formatPercent(metrics.completionRate)),
    '',
    ...heading('Per-Stream Detail'),
    ...renderTable(buildStreamRows(snapshot, evaluations)),
  ];

  const failures = options.failures ?? [];
  if (failures.length > 0) {
    lines.push('', ...heading('Input Failures'));
    for (const failure of failures) {
      lines.push(`[${failure.kind}] ${failure.filePath}: ${failure.reason}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export interface MetricsDocument {
  metrics: AggregateMetrics;
  overwrittenDeadlines: number;
  streams: StreamRow[];
}

/**
 * Machine-readable form of the same run, for downstream consumers
 */
export function buildMetricsDocument(
  snapshot: AggregatorSnapshot,
  metrics: AggregateMetrics,
  evaluations: DeadlineEvaluations
): MetricsDocument {
  return {
    metrics,
    overwrittenDeadlines: snapshot.overwrittenDeadlines,
    streams: buildStreamRows(snapshot, evaluations),
  };
}
