/**
 * Telemetry Tests
 */

import { afterEach, describe, expect, test, vi } from 'vitest';
import { Logger, createLogger, formatPretty, type LogEntry } from '../../framework/telemetry/logger.ts';
import { isOTELEnabled, withDbSpan, withSpan, withSpanSync } from '../../framework/telemetry/otel.ts';

function capture(level: 'debug' | 'info' | 'warn' | 'error' = 'debug') {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, output: (entry) => entries.push(entry) });
  return { logger, entries };
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('Logger - respects level', () => {
    const { logger, entries } = capture('warn');

    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');
    logger.error('error');

    expect(entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
  });

  test('Logger - child merges context', () => {
    const { logger, entries } = capture();

    logger.child({ component: 'dispatcher' }).child({ requestId: 'r1' }).info('hello', { extra: 1 });

    expect(entries[0].context).toEqual({ component: 'dispatcher', requestId: 'r1', extra: 1 });
  });

  test('Logger - error entries carry the error', () => {
    const { logger, entries } = capture();

    logger.error('failed', new TypeError('bad type'));
    logger.error('failed again', 'plain text');

    expect(entries[0].error).toMatchObject({ name: 'TypeError', message: 'bad type' });
    expect(entries[1].error).toMatchObject({ name: 'Error', message: 'plain text' });
  });

  test('Logger - setLevel and isLevelEnabled', () => {
    const { logger } = capture('info');

    expect(logger.isLevelEnabled('debug')).toBe(false);
    logger.setLevel('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
  });

  test('Logger - JSON output goes to the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger({ logLevel: 'info', logFormat: 'json' });

    logger.info('saved', { id: 9007199254740993n });
    logger.warn('slow');

    expect(log).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    const line: unknown = log.mock.calls[0][0];
    expect(typeof line === 'string' && JSON.parse(line)).toMatchObject({
      level: 'info',
      message: 'saved',
      context: { id: '9007199254740993' },
    });
  });

  test('Logger - pretty format lifts the component', () => {
    const line = formatPretty({
      level: 'info',
      message: 'Mapped route',
      timestamp: '2024-01-01T00:00:00.000Z',
      context: { component: 'router', path: '/health' },
    });

    expect(line).toBe(
      '\x1b[2m2024-01-01T00:00:00.000Z\x1b[0m \x1b[32mINFO \x1b[0m [router] Mapped route \x1b[2m{"path":"/health"}\x1b[0m'
    );
  });

  test('Logger - pretty format without context', () => {
    const line = formatPretty({
      level: 'debug',
      message: 'BEGIN',
      timestamp: '2024-01-01T00:00:00.000Z',
      context: {},
    });

    expect(line).toBe('\x1b[2m2024-01-01T00:00:00.000Z\x1b[0m \x1b[36mDEBUG\x1b[0m BEGIN');
  });
});

describe('OpenTelemetry helpers', () => {
  test('OTEL - disabled unless OTEL_ENABLED is true', () => {
    expect(isOTELEnabled()).toBe(process.env.OTEL_ENABLED === 'true');
  });

  test('OTEL - withSpan returns the function result', async () => {
    const result = await withSpan('work', async (span) => {
      span.setAttribute('key', 'value');
      return await Promise.resolve(7);
    });

    expect(result).toBe(7);
  });

  test('OTEL - withSpanSync rethrows', () => {
    expect(() =>
      withSpanSync('work', () => {
        throw new Error('inner');
      })
    ).toThrow('inner');
  });

  test('OTEL - withDbSpan returns the function result', () => {
    expect(withDbSpan('select', 'users', () => 'row')).toBe('row');
  });
});
