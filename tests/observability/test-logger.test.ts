import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/logger.js';
import { createBufferOutput } from '../helpers.js';

describe('Logger', () => {
  it('creates with defaults', () => {
    const logger = new Logger();
    expect(logger.name).toBe('iocancel');
    expect(logger.level).toBe('info');
  });

  it('logs JSON format by default', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output });
    logger.info('test message');
    expect(lines).toHaveLength(1);
    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('test message');
    expect(parsed.logger).toBe('iocancel');
    expect(parsed.extra).toBeNull();
  });

  it('logs text format', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ format: 'text', name: 'io', output });
    logger.warn('slow reader', { operation: 'read' });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[WARN\] \[io\] slow reader operation=read\n$/);
  });

  it('respects log level filtering', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ level: 'warn', output });
    logger.debug('should not appear');
    logger.info('should not appear');
    logger.warn('should appear');
    logger.error('should appear');
    expect(lines).toHaveLength(2);
  });

  it('all log levels work', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ level: 'trace', output });
    logger.trace('t');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    logger.fatal('f');
    expect(lines.map((l) => JSON.parse(l).level)).toEqual(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);
  });

  it('isLevelEnabled follows the threshold', () => {
    const logger = new Logger({ level: 'info' });
    expect(logger.isLevelEnabled('debug')).toBe(false);
    expect(logger.isLevelEnabled('info')).toBe(true);
    expect(logger.isLevelEnabled('fatal')).toBe(true);
  });

  it('child adds bindings to every entry', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output }).child({ worker: 2 }, 'io.worker');
    logger.info('started', { file: 'a.bin' });
    const parsed = JSON.parse(lines[0]);
    expect(parsed.logger).toBe('io.worker');
    expect(parsed.extra).toEqual({ worker: 2, file: 'a.bin' });
  });

  it('extra fields override bindings with the same key', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output }).child({ stage: 'init' });
    logger.info('moved', { stage: 'run' });
    expect(JSON.parse(lines[0]).extra).toEqual({ stage: 'run' });
  });
});
