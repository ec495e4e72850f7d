/**
 * Error hierarchy Tests
 */
import { describe, it, expect } from 'vitest';
import {
  AggregatorFinalizedError,
  DeadlineLensError,
  InputError,
  LogReadError,
  NoInputFilesError,
  ParseError,
  TraceParseError,
  ValidationError,
  describeError,
} from './index.js';

describe('errors', () => {
  it('should mark per-file failures as recoverable', () => {
    const logError = new LogReadError('a.log', 'ENOENT');
    const traceError = new TraceParseError('a.qlog', 'invalid JSON');

    expect(logError).toBeInstanceOf(InputError);
    expect(traceError).toBeInstanceOf(ParseError);
    expect(logError.context.recoverable).toBe(true);
    expect(traceError.context.recoverable).toBe(true);
    expect(logError.code).toBe('E2001');
    expect(traceError.code).toBe('E3001');
    expect(traceError.message).toBe('Failed to parse trace document a.qlog: invalid JSON');
    expect(traceError.context.filePath).toBe('a.qlog');
  });

  it('should mark run-level failures as fatal', () => {
    const noInput = new NoInputFilesError();
    const finalized = new AggregatorFinalizedError('drop');

    expect(noInput).toBeInstanceOf(DeadlineLensError);
    expect(noInput.context.recoverable).toBe(false);
    expect(finalized.context.recoverable).toBe(false);
    expect(finalized.context.operation).toBe('drop');
  });

  it('should serialize with code and context', () => {
    const json = new ValidationError('bad id', { streamId: -1 }).toJSON();

    expect(json.name).toBe('ValidationError');
    expect(json.code).toBe('E1001');
    expect(json.context).toEqual({
      category: 'VALIDATION',
      severity: 'LOW',
      recoverable: false,
      streamId: -1,
    });
  });

  it('should describe thrown values', () => {
    expect(describeError(new Error('disk full'))).toBe('disk full');
    expect(describeError(42)).toBe('42');
  });
});
