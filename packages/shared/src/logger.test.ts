import { describe, it, expect, vi } from 'vitest';
import { createLogger, silentLogger, isLogLevel } from './logger';

function capture() {
  const lines: Array<{ record: Record<string, unknown>; level: string }> = [];
  const sink = vi.fn((line: string, level: string) => {
    lines.push({ record: JSON.parse(line) as Record<string, unknown>, level });
  });
  return { lines, sink };
}

describe('createLogger', () => {
  it('writes one JSON object per event with service, scope and fields', () => {
    const { lines, sink } = capture();
    const logger = createLogger({ scope: 'pipeline', sink });

    logger.info('OK', { durationMs: 3 });

    expect(sink).toHaveBeenCalledTimes(1);
    expect(lines[0]?.level).toBe('info');
    expect(lines[0]?.record).toMatchObject({
      level: 'info',
      service: 'receipt-extraction',
      scope: 'pipeline',
      event: 'OK',
      durationMs: 3
    });
    expect(typeof lines[0]?.record['timestamp']).toBe('string');
  });

  it('drops events below the configured level', () => {
    const { sink } = capture();
    const logger = createLogger({ level: 'warn', sink });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');
    logger.error('kept');

    expect(sink).toHaveBeenCalledTimes(2);
  });

  it('child loggers carry their bound fields', () => {
    const { lines, sink } = capture();
    const logger = createLogger({ scope: 'handler', sink }).child({ fileName: 'receipt.txt' });

    logger.error('TEXT_SOURCE_ERROR', { category: 'AUTH' });

    expect(lines[0]?.level).toBe('error');
    expect(lines[0]?.record).toMatchObject({
      scope: 'handler',
      fileName: 'receipt.txt',
      event: 'TEXT_SOURCE_ERROR',
      category: 'AUTH'
    });
  });

  it('still writes a line when fields cannot be serialized', () => {
    const { lines, sink } = capture();
    const logger = createLogger({ sink });

    logger.warn('odd', { big: BigInt(1) });

    expect(lines[0]?.record['event']).toBe('odd');
    expect(typeof lines[0]?.record['serializationError']).toBe('string');
  });
});

describe('silentLogger', () => {
  it('never writes and returns itself from child', () => {
    const spy = vi.spyOn(console, 'log');
    silentLogger.info('nothing');
    expect(silentLogger.child({ a: 1 })).toBe(silentLogger);
    expect(spy).not.toHaveBeenCalled();
  });
});

describe('isLogLevel', () => {
  it('accepts known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
