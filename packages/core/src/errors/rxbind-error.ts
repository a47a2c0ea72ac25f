/**
 * RxBindError - structured error for binding and data source failures
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating an RxBindError
 */
export interface RxBindErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The value that caused this error; stream errors need not be Error instances */
  cause?: unknown;
}

/**
 * Serialized format of an RxBindError
 */
export interface SerializedRxBindError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedRxBindError | { name: string; message: string; stack?: string };
}

/**
 * Error class for rxbind with a code, category and suggestion.
 *
 * @example
 * ```typescript
 * try {
 *   rx(view).modelAt(indexPath(3));
 * } catch (error) {
 *   if (RxBindError.isCode(error, 'RXBIND_D201')) {
 *     console.log('No item at that index path');
 *   }
 * }
 * ```
 */
export class RxBindError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original value that caused this error */
  override readonly cause?: unknown;

  constructor(options: RxBindErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'RxBindError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RxBindError);
    }
  }

  /**
   * Create an RxBindError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): RxBindError {
    return new RxBindError({ code, context });
  }

  /**
   * Check if an error is an RxBindError
   */
  static isRxBindError(error: unknown): error is RxBindError {
    return error instanceof RxBindError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return RxBindError.isRxBindError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return RxBindError.isRxBindError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.cause !== undefined) {
      lines.push(`Cause: ${describeCause(this.cause)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedRxBindError {
    const result: SerializedRxBindError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (RxBindError.isRxBindError(this.cause)) {
      result.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      result.cause = {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      };
    } else if (this.cause !== undefined) {
      result.cause = { name: typeof this.cause, message: describeCause(this.cause) };
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  if (typeof cause === 'string') return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
