/**
 * Configuration accessor with dot-path key support.
 */

import { existsSync, readFileSync } from 'node:fs';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError } from './errors.js';
import { Logger, setDefaultLogger, type WritableOutput } from './observability/logger.js';

export const LoggingConfigSchema = Type.Object({
  name: Type.Optional(Type.String({ minLength: 1 })),
  level: Type.Optional(
    Type.Union([
      Type.Literal('trace'),
      Type.Literal('debug'),
      Type.Literal('info'),
      Type.Literal('warn'),
      Type.Literal('error'),
      Type.Literal('fatal'),
    ]),
  ),
  format: Type.Optional(Type.Union([Type.Literal('json'), Type.Literal('text')])),
});

export const ConfigSchema = Type.Object({
  logging: Type.Optional(LoggingConfigSchema),
});

export type LoggingConfig = Static<typeof LoggingConfigSchema>;
export type ConfigData = Static<typeof ConfigSchema>;

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  /** Reads and validates a YAML configuration file. */
  static load(path: string): Config {
    if (!existsSync(path)) {
      throw new ConfigError(`Configuration file not found: ${path}`, { path });
    }
    let data: unknown;
    try {
      data = yaml.load(readFileSync(path, 'utf-8'));
    } catch (e) {
      throw new ConfigError(`Invalid YAML in configuration file ${path}: ${e}`, { path }, {
        cause: e instanceof Error ? e : undefined,
      });
    }
    if (data === null || data === undefined) {
      return new Config();
    }
    if (!isRecord(data)) {
      throw new ConfigError(`Configuration file ${path} is not a mapping`, { path });
    }
    Config.validate(data);
    return new Config(data);
  }

  /** Throws {@link ConfigError} listing every schema violation in `data`. */
  static validate(data: unknown): ConfigData {
    if (Value.Check(ConfigSchema, data)) {
      return data;
    }
    const errors = [...Value.Errors(ConfigSchema, data)].map((e) => `${e.path || '/'}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, { errors });
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (isRecord(current) && part in current) {
        current = current[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }

  /** Logging options, after validation. Missing keys take the logger's defaults. */
  get logging(): LoggingConfig {
    const section = this.get('logging', {});
    if (!Value.Check(LoggingConfigSchema, section)) {
      throw new ConfigError('Invalid logging configuration', { section });
    }
    return section;
  }

  createLogger(output?: WritableOutput): Logger {
    const { name, level, format } = this.logging;
    return new Logger({ name, level, format, output });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Installs the package-wide default logger from `config`. */
export function configure(config: Config, output?: WritableOutput): Logger {
  const logger = config.createLogger(output);
  setDefaultLogger(logger);
  return logger;
}
