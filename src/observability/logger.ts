/**
 * Structured logging for cancellation events.
 */

export const LEVELS = Object.freeze({
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
} as const);

export type LogLevel = keyof typeof LEVELS;
export type LogFormat = 'json' | 'text';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  output?: WritableOutput;
}

export class Logger {
  private _name: string;
  private _format: LogFormat;
  private _level: LogLevel;
  private _levelValue: number;
  private _output: WritableOutput;
  private _bindings: Record<string, unknown>;

  constructor(options?: LoggerOptions) {
    this._name = options?.name ?? 'iocancel';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level];
    // stderr: stdout may be the stream being wrapped
    this._output = options?.output ?? { write: (s: string) => console.error(s.trimEnd()) };
    this._bindings = {};
  }

  get name(): string {
    return this._name;
  }

  get level(): LogLevel {
    return this._level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= this._levelValue;
  }

  /** Returns a logger sharing this one's output that adds `bindings` to every entry. */
  child(bindings: Record<string, unknown>, name?: string): Logger {
    const child = new Logger({
      name: name ?? this._name,
      format: this._format,
      level: this._level,
      output: this._output,
    });
    child._bindings = { ...this._bindings, ...bindings };
    return child;
  }

  private _emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const fields: Record<string, unknown> = { ...this._bindings, ...(extra ?? {}) };
    const hasFields = Object.keys(fields).length > 0;
    const now = new Date();

    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level,
        message,
        logger: this._name,
        extra: hasFields ? fields : null,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      let extrasStr = '';
      if (hasFields) {
        extrasStr = ' ' + Object.entries(fields).map(([k, v]) => `${k}=${String(v)}`).join(' ');
      }
      this._output.write(`${ts} [${level.toUpperCase()}] [${this._name}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

let _defaultLogger: Logger = new Logger({ level: 'warn' });

export function getDefaultLogger(): Logger {
  return _defaultLogger;
}

export function setDefaultLogger(logger: Logger): void {
  _defaultLogger = logger;
}
