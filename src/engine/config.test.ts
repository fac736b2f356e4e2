import { describe, it, expect, vi } from 'vitest';
import {
  readFrameLimit,
  resolveEngineConfig,
  FRAME_LIMIT_ENV,
  DEFAULT_FPS,
  DEFAULT_WARMUP_MS,
} from './config';
import { ConfigurationError } from './errors';

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('readFrameLimit', () => {
  it('returns undefined when the variable is absent', () => {
    const logger = createLogger();
    expect(readFrameLimit({}, logger)).toBeUndefined();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('parses a positive integer', () => {
    const logger = createLogger();
    expect(readFrameLimit({ [FRAME_LIMIT_ENV]: '120' }, logger)).toBe(120);
    expect(logger.info).toHaveBeenCalledWith('[Config] Setting frame limit to 120');
  });

  it('ignores values that are not positive integers, with a warning', () => {
    for (const raw of ['abc', '12.5', '0', '-4', '1e3', '0x10', '1.0', '99999999999999999999']) {
      const logger = createLogger();
      expect(readFrameLimit({ [FRAME_LIMIT_ENV]: raw }, logger)).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    }
  });

  it('quotes the rejected value in the warning', () => {
    const logger = createLogger();
    readFrameLimit({ [FRAME_LIMIT_ENV]: 'ten' }, logger);
    expect(logger.warn).toHaveBeenCalledWith(
      '[Config] GRIDLOOP_FRAMELIMIT="ten" is not a positive integer. Ignoring it...'
    );
  });
});

describe('resolveEngineConfig', () => {
  it('fills in defaults', () => {
    expect(resolveEngineConfig({}, {}, createLogger())).toEqual({
      fps: DEFAULT_FPS,
      warmupMs: DEFAULT_WARMUP_MS,
      frameLimit: undefined,
      encoding: 'raw',
    });
  });

  it('takes the frame limit from the environment', () => {
    expect(resolveEngineConfig({}, { [FRAME_LIMIT_ENV]: '5' }, createLogger()).frameLimit).toBe(5);
  });

  it('prefers an explicit frame limit', () => {
    expect(resolveEngineConfig({ frameLimit: 2 }, { [FRAME_LIMIT_ENV]: '5' }, createLogger()).frameLimit).toBe(2);
  });

  it('rejects invalid options', () => {
    expect(() => resolveEngineConfig({ fps: 0 }, {})).toThrow(ConfigurationError);
    expect(() => resolveEngineConfig({ fps: Number.NaN }, {})).toThrow(ConfigurationError);
    expect(() => resolveEngineConfig({ warmupMs: -1 }, {})).toThrow(ConfigurationError);
    expect(() => resolveEngineConfig({ frameLimit: 0 }, {})).toThrow(ConfigurationError);
  });
});
