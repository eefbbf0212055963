import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatEntry, isLogLevel, logger } from '@/utils/logger';

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('formats entries as one JSON object with context fields', () => {
    const entry = JSON.parse(formatEntry('warn', 'Follow-up generation failed', { requestId: 'r-1' }));

    expect(entry).toMatchObject({ level: 'warn', msg: 'Follow-up generation failed', requestId: 'r-1' });
    expect(typeof entry.ts).toBe('string');
  });

  it('recognises only known levels', () => {
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('drops entries below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.info('not shown');
    logger.error('shown', { service: 'chat' });

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({ level: 'error', service: 'chat' });
  });

  it('ignores an unknown LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'chatty';
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    // NODE_ENV is 'test', so the fallback threshold is debug
    logger.debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
  });
});
