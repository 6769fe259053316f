import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, NoopLogger, logOperation, parseLogLevel, type LogSink } from '../index.js';

const fixedClock = () => new Date('2024-03-01T12:00:00.000Z');

function recordingSink(): LogSink & { lines: { stream: 'out' | 'err'; line: string }[] } {
  const lines: { stream: 'out' | 'err'; line: string }[] = [];
  return {
    lines,
    out: (line) => lines.push({ stream: 'out', line }),
    err: (line) => lines.push({ stream: 'err', line }),
  };
}

describe('ConsoleLogger', () => {
  it('formats timestamp, level, message and context', () => {
    const sink = recordingSink();
    const logger = new ConsoleLogger('info', sink, fixedClock);

    logger.info('Cluster status', { status: 'creating', attempt: 1 });

    expect(sink.lines).toEqual([
      { stream: 'out', line: '[2024-03-01T12:00:00.000Z] [INFO] Cluster status {"status":"creating","attempt":1}' },
    ]);
  });

  it('omits empty context', () => {
    const sink = recordingSink();
    new ConsoleLogger('info', sink, fixedClock).info('Done', {});

    expect(sink.lines[0]?.line).toBe('[2024-03-01T12:00:00.000Z] [INFO] Done');
  });

  it('filters below the minimum level', () => {
    const sink = recordingSink();
    const logger = new ConsoleLogger('info', sink, fixedClock);

    logger.debug('hidden');
    logger.trace('hidden');

    expect(sink.lines).toHaveLength(0);
    expect(logger.isEnabled('warn')).toBe(true);
    expect(logger.isEnabled('debug')).toBe(false);
  });

  it('sends warnings and errors to the error stream', () => {
    const sink = recordingSink();
    const logger = new ConsoleLogger('trace', sink, fixedClock);

    logger.warn('careful');
    logger.error('failed');
    logger.trace('detail');

    expect(sink.lines.map((entry) => entry.stream)).toEqual(['err', 'err', 'out']);
  });
});

describe('NoopLogger', () => {
  it('accepts all levels', () => {
    const logger = new NoopLogger();

    expect(() => {
      logger.error('a');
      logger.warn('b');
      logger.info('c');
      logger.debug('d');
      logger.trace('e');
    }).not.toThrow();
  });
});

describe('logOperation', () => {
  it('logs the call at debug level', () => {
    const logger = new NoopLogger();
    const debug = vi.spyOn(logger, 'debug');

    logOperation(logger, 'iam', 'GetRole', 42);

    expect(debug).toHaveBeenCalledWith('AWS operation completed', {
      service: 'iam',
      operation: 'GetRole',
      durationMs: 42,
    });
  });
});

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('warn')).toBe('warn');
  });

  it('falls back for unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel(undefined, 'error')).toBe('error');
  });
});
