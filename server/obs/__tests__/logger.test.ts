import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger, type LogLevel } from '../logger';

describe('createLogger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-02-08T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('drops entries below the configured level', () => {
    const lines: Array<[LogLevel, string]> = [];
    const logger = createLogger({ observability: { logLevel: 'warn' } }, (level, line) => {
      lines.push([level, line]);
    });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown', { articleId: 7 });

    expect(lines).toEqual([
      ['warn', '{"level":"warn","message":"shown","ts":"2026-02-08T00:00:00.000Z","articleId":7}'],
    ]);
  });

  it('merges child bindings and flattens errors', () => {
    const lines: string[] = [];
    const logger = createLogger({ observability: { logLevel: 'error' } }, (_level, line) => {
      lines.push(line);
    }).child({ route: 'present' });

    logger.error('failed', { error: new TypeError('boom') });

    expect(JSON.parse(lines[0])).toEqual({
      level: 'error',
      message: 'failed',
      ts: '2026-02-08T00:00:00.000Z',
      route: 'present',
      error: { name: 'TypeError', message: 'boom' },
    });
  });
});
