export { Logger, LEVELS, getDefaultLogger, setDefaultLogger } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions, WritableOutput } from './logger.js';
