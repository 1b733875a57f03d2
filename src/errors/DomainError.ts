/**
 * Domain Error Base Class
 * Provides structured error handling with error codes and retry capability
 * information.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ErrorCode =
  // Validation Errors (2xxx)
  | 'VALID_001' // Missing required field
  | 'VALID_002' // Invalid field format
  | 'VALID_003' // Constraint violation
  // Input Errors (6xxx)
  | 'INPUT_001' // Source not found
  | 'INPUT_002' // Source unreadable
  // Generic Errors
  | 'UNKNOWN';

// ============================================================================
// Base Domain Error
// ============================================================================

export interface DomainErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** Source path if applicable */
  filePath?: string;
  /** Position of the offending record in its collection */
  recordIndex?: number;
  /** Additional context */
  [key: string]: unknown;
}

export abstract class DomainError extends Error {
  /** Unique error code for categorization */
  abstract readonly code: ErrorCode;
  /** Whether the operation can be retried */
  readonly isRetryable: boolean;
  /** Additional context about the error */
  readonly context: DomainErrorContext;
  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a JSON-serializable object for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      isRetryable: this.isRetryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  /**
   * Create a user-friendly error message (without sensitive details).
   */
  toUserMessage(): string {
    return `Error ${this.code}: ${this.message}`;
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export interface ValidationIssue {
  field: string;
  message: string;
  value?: unknown;
}

export class ValidationError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    public readonly issues: ValidationIssue[],
    context: DomainErrorContext = {},
    code: ErrorCode = 'VALID_001'
  ) {
    super(message, { ...context, issues }, false);
    this.code = code;
  }

  static missingField(field: string, recordIndex?: number): ValidationError {
    return new ValidationError(
      `Missing required field: ${field}`,
      [{ field, message: 'Field is required' }],
      { recordIndex }
    );
  }

  static invalidFormat(field: string, expectedFormat: string, value?: unknown): ValidationError {
    return new ValidationError(
      `Invalid format for field: ${field}`,
      [{ field, message: `Expected ${expectedFormat}`, value }],
      {},
      'VALID_002'
    );
  }

  static multipleIssues(issues: ValidationIssue[]): ValidationError {
    return new ValidationError(
      `Validation failed: ${issues.length} issue(s)`,
      issues,
      {},
      'VALID_003'
    );
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class InputError extends DomainError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: ErrorCode,
    filePath: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message, { ...context, filePath }, isRetryable);
    this.code = code;
  }

  static notFound(filePath: string): InputError {
    return new InputError(`Envelope source not found: ${filePath}`, 'INPUT_001', filePath);
  }

  static unreadable(filePath: string, cause?: Error): InputError {
    return new InputError(
      `Envelope source could not be read: ${filePath}`,
      'INPUT_002',
      filePath,
      { cause },
      true
    );
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Check if an error is a DomainError.
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

/**
 * Wrap an unknown error in a DomainError if it isn't one already.
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : defaultMessage;
  const cause = error instanceof Error ? error : undefined;

  return new (class UnknownError extends DomainError {
    readonly code: ErrorCode = 'UNKNOWN';
  })(message, { cause });
}
