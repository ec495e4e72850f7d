/**
 * Custom error hierarchy for deadline-lens
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'INPUT'
  | 'PARSE'
  | 'STATE'
  | 'CONFIGURATION'
  | 'RENDER'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  /** The run can continue without the input that failed */
  recoverable: boolean;
  filePath?: string;
  [key: string]: unknown;
}

/**
 * Base error class for deadline-lens
 */
export class DeadlineLensError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'DeadlineLensError';
    this.code = code;
    this.context = {
      ...context,
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      recoverable: context.recoverable ?? false,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (bad identifiers, out-of-range values)
 */
export class ValidationError extends DeadlineLensError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      recoverable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Input errors (missing directories, unreadable files)
 */
export class InputError extends DeadlineLensError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'INPUT',
      severity: 'HIGH',
      recoverable: false,
      ...context,
    });
    this.name = 'InputError';
  }
}

export class LogReadError extends InputError {
  public readonly filePath: string;
  public readonly reason: string;

  constructor(filePath: string, reason: string, context: Partial<ErrorContext> = {}) {
    super(`Failed to read log file ${filePath}: ${reason}`, 'E2001', {
      severity: 'MEDIUM',
      recoverable: true,
      filePath,
      ...context,
    });
    this.name = 'LogReadError';
    this.filePath = filePath;
    this.reason = reason;
  }
}

export class NoInputFilesError extends InputError {
  constructor(context: Partial<ErrorContext> = {}) {
    super('No input files found: nothing to analyze', 'E2002', {
      severity: 'CRITICAL',
      recoverable: false,
      ...context,
    });
    this.name = 'NoInputFilesError';
  }
}

export class InputDirectoryError extends InputError {
  public readonly directory: string;

  constructor(directory: string, reason: string, context: Partial<ErrorContext> = {}) {
    super(`Cannot list input directory ${directory}: ${reason}`, 'E2003', {
      directory,
      ...context,
    });
    this.name = 'InputDirectoryError';
    this.directory = directory;
  }
}

/**
 * Parse errors (malformed trace documents)
 */
export class ParseError extends DeadlineLensError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'PARSE',
      severity: 'MEDIUM',
      recoverable: true,
      ...context,
    });
    this.name = 'ParseError';
  }
}

export class TraceParseError extends ParseError {
  public readonly filePath: string;
  public readonly reason: string;

  constructor(filePath: string, reason: string, context: Partial<ErrorContext> = {}) {
    super(`Failed to parse trace document ${filePath}: ${reason}`, 'E3001', {
      filePath,
      ...context,
    });
    this.name = 'TraceParseError';
    this.filePath = filePath;
    this.reason = reason;
  }
}

/**
 * Aggregator state errors
 */
export class StateError extends DeadlineLensError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'STATE',
      severity: 'HIGH',
      recoverable: false,
      ...context,
    });
    this.name = 'StateError';
  }
}

export class AggregatorFinalizedError extends StateError {
  constructor(operation: string, context: Partial<ErrorContext> = {}) {
    super(`Cannot apply ${operation}: aggregator already finalized`, 'E4001', {
      severity: 'MEDIUM',
      operation,
      ...context,
    });
    this.name = 'AggregatorFinalizedError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends DeadlineLensError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      recoverable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Chart rendering errors
 */
export class RenderError extends DeadlineLensError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E7001', {
      category: 'RENDER',
      severity: 'MEDIUM',
      recoverable: false,
      ...context,
    });
    this.name = 'RenderError';
  }
}

/**
 * Human-readable cause for an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
