/**
 * Engine configuration
 *
 * Scheduler options come from code; the frame limit may also be forced from
 * the environment so CI runs and smoke tests terminate on their own.
 */

import { ConfigurationError } from './errors';
import type { FrameEncoding } from './encoder';

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export const FRAME_LIMIT_ENV = 'GRIDLOOP_FRAMELIMIT';

export const DEFAULT_FPS = 30;
export const DEFAULT_WARMUP_MS = 1000;

export interface EngineConfig {
  fps: number;
  warmupMs: number;
  /** Undefined runs until quit() */
  frameLimit: number | undefined;
  encoding: FrameEncoding;
}

export interface EngineConfigOptions {
  fps?: number;
  warmupMs?: number;
  frameLimit?: number;
  encoding?: FrameEncoding;
}

/**
 * Read the frame limit override. Anything but a positive integer is
 * ignored with a warning.
 */
export function readFrameLimit(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = console
): number | undefined {
  const raw = env[FRAME_LIMIT_ENV];
  if (raw === undefined || raw.trim() === '') return undefined;

  const text = raw.trim();
  const value = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(value) || value <= 0) {
    logger.warn(`[Config] ${FRAME_LIMIT_ENV}=${JSON.stringify(raw)} is not a positive integer. Ignoring it...`);
    return undefined;
  }

  logger.info(`[Config] Setting frame limit to ${value}`);
  return value;
}

/**
 * Merge explicit options with the environment. An explicit frameLimit wins.
 *
 * @throws ConfigurationError on a non-positive fps, a negative warm-up or
 * a non-positive frame limit
 */
export function resolveEngineConfig(
  options: EngineConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = console
): EngineConfig {
  const fps = options.fps ?? DEFAULT_FPS;
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new ConfigurationError(`fps must be a positive number, got ${fps}`);
  }

  const warmupMs = options.warmupMs ?? DEFAULT_WARMUP_MS;
  if (!Number.isFinite(warmupMs) || warmupMs < 0) {
    throw new ConfigurationError(`warmupMs must be zero or more, got ${warmupMs}`);
  }

  if (options.frameLimit !== undefined && (!Number.isSafeInteger(options.frameLimit) || options.frameLimit <= 0)) {
    throw new ConfigurationError(`frameLimit must be a positive integer, got ${options.frameLimit}`);
  }

  return {
    fps,
    warmupMs,
    frameLimit: options.frameLimit ?? readFrameLimit(env, logger),
    encoding: options.encoding ?? 'raw',
  };
}
