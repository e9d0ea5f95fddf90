/**
 * iocancel - cooperative cancellation for synchronous I/O.
 */

// Core
export { CancellationToken } from './cancel.js';
export type { SharedCancellationToken } from './cancel.js';
export { Cancellable } from './cancellable.js';
export type { CancellableOptions } from './cancellable.js';
export { CancellationGuard } from './guard.js';

// I/O capabilities and resources
export {
  SeekFrom,
  Empty,
  empty,
  Cursor,
  BufReader,
  bufReader,
  DEFAULT_BUF_SIZE,
  FileStream,
} from './io/index.js';
export type { Read, Write, Seek, BufRead } from './io/index.js';

// Config
export { Config, ConfigSchema, LoggingConfigSchema, configure } from './config.js';
export type { ConfigData, LoggingConfig } from './config.js';

// Errors
export {
  IoError,
  OperationCancelledError,
  UnexpectedEofError,
  WriteZeroError,
  InvalidInputError,
  InvalidDataError,
  ConfigError,
  ErrorCodes,
  isCancellationError,
  hasErrorCode,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Observability
export { Logger, LEVELS, getDefaultLogger, setDefaultLogger } from './observability/index.js';
export type { LogLevel, LogFormat, LoggerOptions, WritableOutput } from './observability/index.js';

export const VERSION = '0.1.0';
