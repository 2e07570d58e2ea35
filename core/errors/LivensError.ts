/**
 * Defines the severity levels for livens errors.
 */
export enum ErrorSeverity {
  /** The operation can potentially continue */
  Recoverable = 'recoverable',
  /** The operation cannot continue */
  Fatal = 'fatal',
  /** Informational message, not strictly an error */
  Info = 'info',
  /** Warning message */
  Warning = 'warning',
}

/**
 * Base interface for livens error details.
 * Specific error types should extend this.
 */
export interface BaseErrorDetails {
  namespace?: string;
  [key: string]: unknown;
}

/**
 * Options for creating a LivensError instance.
 */
export interface LivensErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  cause?: unknown;
}

/**
 * Base class for all custom livens errors.
 * Provides structure for error codes, severity and details.
 */
export class LivensError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;

  constructor(message: string, options: LivensErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Recoverable errors and explicit warnings can be reported without
   * aborting the surrounding operation.
   */
  public canBeWarning(): boolean {
    return (
      this.severity === ErrorSeverity.Recoverable ||
      this.severity === ErrorSeverity.Warning
    );
  }

  /**
   * Provides a string representation including code and severity.
   */
  public toString(): string {
    let result = `[${this.code}] ${this.message}`;

    if (this.details?.namespace) {
      result += ` in ${this.details.namespace}`;
    }

    result += ` (Severity: ${this.severity})`;
    return result;
  }

  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
    };

    if (this.details) {
      result.details = this.details;
    }

    return result;
  }
}
