import { describe, it, expect, vi } from 'vitest';
import { createConsoleLogger, resolveLogLevel } from './logger.js';

function createSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createConsoleLogger', () => {
  it('drops entries below the configured level', () => {
    const sink = createSink();
    const logger = createConsoleLogger('warn', sink);

    logger.debug('providers.client.retry', { attempt: 1 });
    logger.info('hello');
    logger.warn('providers.kling.status.unknown', { status: 'paused' });
    logger.error('failed');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledWith('providers.kling.status.unknown', { status: 'paused' });
    expect(sink.error).toHaveBeenCalledWith('failed');
  });

  it('writes nothing when silent', () => {
    const sink = createSink();
    const logger = createConsoleLogger('silent', sink);
    logger.error('failed');
    expect(sink.error).not.toHaveBeenCalled();
  });
});

describe('resolveLogLevel', () => {
  it('normalizes known levels and falls back when unset', () => {
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
    expect(resolveLogLevel(undefined, 'warn')).toBe('warn');
    expect(resolveLogLevel('')).toBe('info');
  });

  it('throws on unknown levels', () => {
    expect(() => resolveLogLevel('verbose')).toThrow(
      'Invalid log level "verbose". Expected one of: debug, info, warn, error, silent.',
    );

    try {
      resolveLogLevel('verbose');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: 'R003', category: 'runtime' });
    }
  });
});
