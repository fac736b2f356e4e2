import { describe, it, expect, vi } from 'vitest';
import { GameBoard } from './board';
import type { Clock, SleepResult } from './clock';
import { FRAME_LIMIT_ENV } from './config';
import type { EncodedFrame } from './encoder';
import { SchedulerStateError } from './errors';
import { InputSnapshot } from './input';
import {
  FrameScheduler,
  type FrameRenderer,
  type FrameSchedulerOptions,
  type Game,
  type GameContext,
  type RenderOutcome,
} from './scheduler';

const FRAME_MS = 1000 / 30;

/** Time only moves when the test or a sleep moves it */
function createVirtualClock() {
  let time = 0;
  const sleeps: number[] = [];
  const clock: Clock = {
    now: () => time,
    sleep: async (ms: number, signal: AbortSignal): Promise<SleepResult> => {
      if (signal.aborted) return 'interrupted';
      sleeps.push(ms);
      time += ms;
      return 'elapsed';
    },
  };
  return {
    clock,
    sleeps,
    advance(ms: number) {
      time += ms;
    },
  };
}

function createRenderer(outcomes: RenderOutcome[] = []) {
  const frames: EncodedFrame[] = [];
  const renderer = {
    render: (frame: EncodedFrame): RenderOutcome => {
      frames.push(frame);
      return outcomes[frames.length - 1] ?? { status: 'ok' };
    },
    close: vi.fn(),
  } satisfies FrameRenderer;
  return { renderer, frames };
}

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createGame(onLoop: (context: GameContext) => void = () => {}) {
  const calls: string[] = [];
  const game: Game = {
    initialize: () => {
      calls.push('initialize');
    },
    gameLoop: context => {
      calls.push('gameLoop');
      onLoop(context);
    },
  };
  return { game, calls };
}

function createScheduler(overrides: Partial<FrameSchedulerOptions> & Pick<FrameSchedulerOptions, 'game' | 'renderer'>) {
  return new FrameScheduler({
    board: new GameBoard(4, 4),
    clock: createVirtualClock().clock,
    logger: createLogger(),
    env: {},
    ...overrides,
  });
}

describe('FrameScheduler lifecycle', () => {
  it('warms up, initializes, renders once, then loops until the frame limit is exceeded', async () => {
    const virtual = createVirtualClock();
    const { game, calls } = createGame();
    const { renderer, frames } = createRenderer();
    const scheduler = createScheduler({ game, renderer, clock: virtual.clock, frameLimit: 2 });

    expect(scheduler.state).toBe('not-started');
    const stats = await scheduler.start();

    expect(virtual.sleeps[0]).toBe(1000);
    expect(calls).toEqual(['initialize', 'gameLoop', 'gameLoop', 'gameLoop']);
    expect(frames).toHaveLength(4);
    expect(renderer.close).toHaveBeenCalledTimes(1);
    expect(stats).toEqual({ frames: 3, droppedFrames: 0, stopReason: 'frame-limit' });
    expect(scheduler.state).toBe('stopped');
    expect(scheduler.frameCount).toBe(3);
  });

  it('finishes the current frame when the game quits', async () => {
    const { game, calls } = createGame(context => {
      if (context.frame === 2) context.quit();
    });
    const { renderer, frames } = createRenderer();
    const stats = await createScheduler({ game, renderer }).start();

    expect(calls.filter(c => c === 'gameLoop')).toHaveLength(3);
    expect(frames).toHaveLength(4);
    expect(stats).toEqual({ frames: 3, droppedFrames: 0, stopReason: 'quit' });
  });

  it('takes the frame limit from the environment', async () => {
    const { game, calls } = createGame();
    const { renderer } = createRenderer();
    const stats = await createScheduler({ game, renderer, env: { [FRAME_LIMIT_ENV]: '1' } }).start();

    expect(calls).toEqual(['initialize', 'gameLoop', 'gameLoop']);
    expect(stats.frames).toBe(2);
  });

  it('cannot be started twice', async () => {
    const { game } = createGame(context => context.quit());
    const { renderer } = createRenderer();
    const scheduler = createScheduler({ game, renderer });

    const running = scheduler.start();
    await expect(scheduler.start()).rejects.toThrow(SchedulerStateError);
    await running;
    await expect(scheduler.start()).rejects.toThrow('Cannot start a scheduler that is stopped');
  });

  it('stops for good when quit before start', async () => {
    const { game, calls } = createGame();
    const { renderer } = createRenderer();
    const scheduler = createScheduler({ game, renderer });

    scheduler.quit();
    expect(scheduler.state).toBe('stopped');
    await expect(scheduler.start()).rejects.toThrow(SchedulerStateError);
    expect(calls).toEqual([]);
  });

  it('tears down and rethrows when the game throws', async () => {
    const { game } = createGame(() => {
      throw new Error('boom');
    });
    const { renderer } = createRenderer();
    const scheduler = createScheduler({ game, renderer });

    await expect(scheduler.start()).rejects.toThrow('boom');
    expect(renderer.close).toHaveBeenCalledTimes(1);
    expect(scheduler.state).toBe('stopped');
  });

  it('passes frame rate and board to the game', async () => {
    const seen: Array<[number, number]> = [];
    const board = new GameBoard(2, 2);
    const { game } = createGame(context => {
      seen.push([context.frame, context.frameRate]);
      context.board.setBackground(0, 0, context.frame + 1);
    });
    const { renderer, frames } = createRenderer();
    await createScheduler({ game, renderer, board, fps: 60, frameLimit: 1 }).start();

    expect(seen).toEqual([[0, 60], [1, 60]]);
    expect(frames[2].background).toEqual({ encoding: 'raw', values: [2, 0, 0, 0] });
  });

  it('sends run-length frames when configured', async () => {
    const { game } = createGame(context => context.quit());
    const { renderer, frames } = createRenderer();
    await createScheduler({ game, renderer, encoding: 'rle' }).start();

    expect(frames[0].symbol).toEqual({ encoding: 'rle', runs: [[0, 16]] });
  });
});

describe('FrameScheduler interruption', () => {
  it('skips initialize when quit interrupts the warm-up', async () => {
    let abortSeen = false;
    const clock: Clock = {
      now: () => 0,
      sleep: (_ms, signal) =>
        new Promise(resolve => {
          signal.addEventListener('abort', () => {
            abortSeen = true;
            resolve('interrupted');
          });
        }),
    };
    const { game, calls } = createGame();
    const { renderer, frames } = createRenderer();
    const scheduler = createScheduler({ game, renderer, clock });

    const running = scheduler.start();
    scheduler.quit();
    const stats = await running;

    expect(abortSeen).toBe(true);
    expect(calls).toEqual([]);
    expect(frames).toHaveLength(0);
    expect(renderer.close).toHaveBeenCalledTimes(1);
    expect(stats.stopReason).toBe('quit');
  });

  it('treats an interrupted pacing wait as a shutdown, not an error', async () => {
    let sleepCount = 0;
    const clock: Clock = {
      now: () => 0,
      sleep: async () => {
        sleepCount++;
        return sleepCount === 1 ? 'elapsed' : 'interrupted';
      },
    };
    const { game, calls } = createGame();
    const { renderer } = createRenderer();
    const stats = await createScheduler({ game, renderer, clock }).start();

    expect(calls).toEqual(['initialize', 'gameLoop']);
    expect(stats).toEqual({ frames: 1, droppedFrames: 0, stopReason: 'interrupted' });
  });
});

describe('FrameScheduler rendering outcomes', () => {
  it('drops frames on transient failures and keeps going', async () => {
    const logger = createLogger();
    const { game, calls } = createGame();
    const { renderer, frames } = createRenderer([
      { status: 'ok' },
      { status: 'transient', reason: 'slow consumer' },
    ]);
    const stats = await createScheduler({ game, renderer, logger, frameLimit: 2 }).start();

    expect(frames).toHaveLength(4);
    expect(calls.filter(c => c === 'gameLoop')).toHaveLength(3);
    expect(stats.droppedFrames).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('[FrameScheduler] Frame 0 dropped: slow consumer');
  });

  it('stops when the connection is lost', async () => {
    const logger = createLogger();
    const { game, calls } = createGame();
    const { renderer } = createRenderer([
      { status: 'ok' },
      { status: 'ok' },
      { status: 'connection-lost', reason: 'socket closed' },
    ]);
    const stats = await createScheduler({ game, renderer, logger }).start();

    expect(calls.filter(c => c === 'gameLoop')).toHaveLength(2);
    expect(stats).toEqual({ frames: 2, droppedFrames: 0, stopReason: 'connection-lost' });
    expect(logger.error).toHaveBeenCalledWith('[FrameScheduler] Connection lost: socket closed');
    expect(renderer.close).toHaveBeenCalledTimes(1);
  });

  it('awaits asynchronous renderers', async () => {
    const order: string[] = [];
    const renderer: FrameRenderer = {
      render: async () => {
        await Promise.resolve();
        order.push('rendered');
        return { status: 'ok' };
      },
      close: async () => {
        order.push('closed');
      },
    };
    const { game } = createGame(context => {
      order.push('loop');
      context.quit();
    });
    await createScheduler({ game, renderer }).start();

    expect(order).toEqual(['rendered', 'loop', 'rendered', 'closed']);
  });

  it('keeps the game error when closing the renderer also fails', async () => {
    const logger = createLogger();
    const renderer: FrameRenderer = {
      render: () => ({ status: 'ok' }),
      close: async () => {
        throw new Error('pipe broken');
      },
    };
    const { game } = createGame(() => {
      throw new Error('game crashed');
    });

    await expect(createScheduler({ game, renderer, logger }).start()).rejects.toThrow('game crashed');
    expect(logger.error).toHaveBeenCalledWith('[FrameScheduler] Teardown failed: pipe broken');
  });

  it('still reports stats when only the teardown fails', async () => {
    const logger = createLogger();
    const renderer: FrameRenderer = {
      render: () => ({ status: 'ok' }),
      close: () => {
        throw new Error('pipe broken');
      },
    };
    const { game } = createGame(context => context.quit());

    const stats = await createScheduler({ game, renderer, logger }).start();
    expect(stats).toEqual({ frames: 1, droppedFrames: 0, stopReason: 'quit' });
    expect(logger.error).toHaveBeenCalledWith('[FrameScheduler] Teardown failed: pipe broken');
  });
});

describe('FrameScheduler input', () => {
  it('updates every key before the game runs', async () => {
    const input = new InputSnapshot();
    input.press('up');
    const seen: Array<{ justPressed: boolean; stillPressed: boolean }> = [];
    const { game } = createGame(context => {
      seen.push({
        justPressed: context.controls.up.justPressed,
        stillPressed: context.controls.up.stillPressed,
      });
    });
    const { renderer } = createRenderer();
    await createScheduler({ game, renderer, input, frameLimit: 1 }).start();

    expect(seen).toEqual([
      { justPressed: true, stillPressed: false },
      { justPressed: false, stillPressed: true },
    ]);
  });

  it('sees presses delivered mid-frame on the next frame', async () => {
    const seen: boolean[] = [];
    const { game } = createGame(context => {
      if (context.frame === 0) context.controls.snapshot.press('space');
      seen.push(context.controls.space.pressed);
    });
    const { renderer } = createRenderer();
    const scheduler = createScheduler({ game, renderer, frameLimit: 1 });
    await scheduler.start();

    expect(seen).toEqual([false, true]);
    expect(scheduler.input.isPressed('space')).toBe(true);
  });
});

describe('FrameScheduler pacing', () => {
  it('keeps frame starts at least one frame apart without drifting over 100 frames', async () => {
    const virtual = createVirtualClock();
    const starts: number[] = [];
    const { game } = createGame(() => {
      starts.push(virtual.clock.now());
    });
    const { renderer } = createRenderer();
    await createScheduler({ game, renderer, clock: virtual.clock, frameLimit: 100 }).start();

    expect(starts).toHaveLength(101);
    for (let i = 1; i < starts.length; i++) {
      expect(starts[i] - starts[i - 1]).toBeGreaterThanOrEqual(FRAME_MS - 1e-9);
    }
    expect(starts[100] - starts[0]).toBeCloseTo(100 * FRAME_MS, 6);
  });

  it('only waits for the remainder of the frame', async () => {
    const virtual = createVirtualClock();
    const { game } = createGame(() => virtual.advance(20));
    const { renderer } = createRenderer();
    await createScheduler({ game, renderer, clock: virtual.clock, frameLimit: 1 }).start();

    expect(virtual.sleeps).toHaveLength(3);
    expect(virtual.sleeps[1]).toBeCloseTo(FRAME_MS - 20, 9);
    expect(virtual.sleeps[2]).toBeCloseTo(FRAME_MS - 20, 9);
  });

  it('does not rush the frames that follow a slow one', async () => {
    const virtual = createVirtualClock();
    const starts: number[] = [];
    const { game } = createGame(context => {
      starts.push(virtual.clock.now());
      if (context.frame === 1) virtual.advance(100);
    });
    const { renderer } = createRenderer();
    await createScheduler({ game, renderer, clock: virtual.clock, frameLimit: 3 }).start();

    expect(starts[1] - starts[0]).toBeCloseTo(FRAME_MS, 9);
    expect(starts[2] - starts[1]).toBeCloseTo(100, 9);
    expect(starts[3] - starts[2]).toBeCloseTo(FRAME_MS, 9);
  });

  it('paces against the system clock', async () => {
    const starts: number[] = [];
    const { game } = createGame(() => {
      starts.push(performance.now());
    });
    const { renderer } = createRenderer();
    await new FrameScheduler({
      board: new GameBoard(2, 2),
      game,
      renderer,
      fps: 100,
      warmupMs: 0,
      frameLimit: 4,
      logger: createLogger(),
      env: {},
    }).start();

    expect(starts).toHaveLength(5);
    for (let i = 1; i < starts.length; i++) {
      // setTimeout may fire a fraction of a millisecond early against performance.now()
      expect(starts[i] - starts[i - 1]).toBeGreaterThanOrEqual(9);
    }
  });
});
