/**
 * Error hierarchy for iocancel.
 *
 * Every error carries an errno-style `code` so it reads like the
 * `NodeJS.ErrnoException` values thrown by `node:fs` and sockets.
 */

import { constants } from 'node:os';

export const ErrorCodes = Object.freeze({
  CANCELLED: 'EPIPE',
  UNEXPECTED_EOF: 'EOF',
  WRITE_ZERO: 'EIO',
  INVALID_INPUT: 'EINVAL',
  INVALID_DATA: 'EILSEQ',
  INTERRUPTED: 'EINTR',
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorOptions {
  cause?: Error;
  syscall?: string;
}

export class IoError extends Error {
  readonly code: string;
  readonly errno: number | undefined;
  readonly syscall: string | undefined;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    errno?: number,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'IoError';
    this.code = code;
    this.errno = errno;
    this.syscall = options?.syscall;
    this.details = details ?? {};
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      name: this.name,
      code: this.code,
      message: this.message,
    };
    if (this.errno !== undefined) {
      obj.errno = this.errno;
    }
    if (this.syscall !== undefined) {
      obj.syscall = this.syscall;
    }
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    return obj;
  }
}

/**
 * Raised by a token check once the token is cancelled.
 *
 * Uses the broken-pipe code so generic I/O error handling treats it like a
 * peer that went away.
 */
export class OperationCancelledError extends IoError {
  constructor(operation: string = 'check', options?: ErrorOptions) {
    super(
      ErrorCodes.CANCELLED,
      `Operation '${operation}' aborted: cancellation requested`,
      constants.errno.EPIPE,
      { operation },
      { syscall: operation, ...options },
    );
    this.name = 'OperationCancelledError';
  }

  get operation(): string {
    const value = this.details['operation'];
    return typeof value === 'string' ? value : 'check';
  }
}

export class UnexpectedEofError extends IoError {
  constructor(expected: number, received: number, options?: ErrorOptions) {
    super(
      ErrorCodes.UNEXPECTED_EOF,
      `Unexpected end of stream: wanted ${expected} bytes, got ${received}`,
      undefined,
      { expected, received },
      options,
    );
    this.name = 'UnexpectedEofError';
  }
}

export class WriteZeroError extends IoError {
  constructor(remaining: number, options?: ErrorOptions) {
    super(
      ErrorCodes.WRITE_ZERO,
      `Failed to write whole buffer: ${remaining} bytes left`,
      constants.errno.EIO,
      { remaining },
      options,
    );
    this.name = 'WriteZeroError';
  }
}

export class InvalidInputError extends IoError {
  constructor(message: string = 'Invalid input', options?: ErrorOptions) {
    super(ErrorCodes.INVALID_INPUT, message, constants.errno.EINVAL, {}, options);
    this.name = 'InvalidInputError';
  }
}

export class InvalidDataError extends IoError {
  constructor(message: string = 'Stream did not contain valid UTF-8', options?: ErrorOptions) {
    super(ErrorCodes.INVALID_DATA, message, constants.errno.EILSEQ, {}, options);
    this.name = 'InvalidDataError';
  }
}

export class ConfigError extends IoError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(ErrorCodes.CONFIG_INVALID, message, undefined, details, options);
    this.name = 'ConfigError';
  }
}

function readCode(error: unknown): unknown {
  if (error === null || typeof error !== 'object' || !('code' in error)) return undefined;
  return error.code;
}

function readOperation(error: object): unknown {
  if (!('details' in error)) return undefined;
  const details = error.details;
  if (details === null || typeof details !== 'object' || !('operation' in details)) return undefined;
  return details.operation;
}

/**
 * True for a cancellation error, or for its `toJSON()` form after it was
 * posted to another worker or sent through `JSON.stringify`.
 *
 * An error posted as-is loses its `code` to structured cloning and is not
 * recognised; post `err.toJSON()` instead.
 */
export function isCancellationError(error: unknown): boolean {
  if (error instanceof OperationCancelledError) return true;
  if (error === null || typeof error !== 'object') return false;
  if (readCode(error) !== ErrorCodes.CANCELLED) return false;
  if ('name' in error && error.name === 'OperationCancelledError') return true;
  return typeof readOperation(error) === 'string';
}

/** True for an error that carries the given errno-style code. */
export function hasErrorCode(error: unknown, code: string): boolean {
  return readCode(error) === code;
}
