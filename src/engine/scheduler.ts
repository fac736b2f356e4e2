/**
 * Frame scheduler
 *
 * Drives a game at a fixed target frame rate:
 *
 *   warm-up → initialize() → render
 *   loop: sample input → gameLoop() → encode + render → pace → count
 *
 * Pacing waits until one frame duration has passed since the previous
 * frame started, then takes the current time as the new frame start, so a
 * slow frame never makes the following frames run early to catch up.
 */

import type { GameBoard } from './board';
import { systemClock, type Clock } from './clock';
import { resolveEngineConfig, type EngineConfig, type EngineConfigOptions, type Logger } from './config';
import { encodeFrame, type EncodedFrame } from './encoder';
import { SchedulerStateError } from './errors';
import { Controls, InputSnapshot } from './input';

// ============================================================================
// Collaborator contracts
// ============================================================================

/**
 * What a game supplies. Both callbacks run on the scheduler's loop; the
 * board may only be changed from inside them.
 */
export interface Game {
  initialize(context: GameContext): void;
  gameLoop(context: GameContext): void;
}

export interface GameContext {
  readonly board: GameBoard;
  readonly controls: Controls;
  /** Frames completed so far */
  readonly frame: number;
  /** Target frames per second */
  readonly frameRate: number;
  quit(): void;
}

export type RenderOutcome =
  | { status: 'ok' }
  | { status: 'transient'; reason: string }
  | { status: 'connection-lost'; reason: string };

/**
 * Receives one encoded frame per call (a terminal, a socket, a recorder)
 */
export interface FrameRenderer {
  render(frame: EncodedFrame): RenderOutcome | Promise<RenderOutcome>;
  close(): void | Promise<void>;
}

// ============================================================================
// Scheduler
// ============================================================================

export type SchedulerState = 'not-started' | 'running' | 'stopped';

export type StopReason = 'quit' | 'frame-limit' | 'connection-lost' | 'interrupted';

export interface SchedulerStats {
  frames: number;
  droppedFrames: number;
  stopReason: StopReason;
}

export interface FrameSchedulerOptions extends EngineConfigOptions {
  board: GameBoard;
  game: Game;
  renderer: FrameRenderer;
  /** Shared with the input source; a fresh one is created if omitted */
  input?: InputSnapshot;
  fireCooldown?: number;
  clock?: Clock;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export class FrameScheduler {
  readonly board: GameBoard;
  readonly controls: Controls;
  private readonly game: Game;
  private readonly renderer: FrameRenderer;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly config: EngineConfig;
  private readonly abort = new AbortController();

  private currentState: SchedulerState = 'not-started';
  private stopRequested = false;
  private stopReason: StopReason = 'quit';
  private frame = 0;
  private droppedFrames = 0;
  private lastFrameStart = 0;

  /**
   * @throws ConfigurationError for invalid fps, warm-up or frame limit
   */
  constructor(options: FrameSchedulerOptions) {
    this.board = options.board;
    this.game = options.game;
    this.renderer = options.renderer;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? console;
    this.config = resolveEngineConfig(options, options.env, this.logger);
    this.controls = new Controls(options.input ?? new InputSnapshot(), options.fireCooldown);
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get frameCount(): number {
    return this.frame;
  }

  /**
   * Target rate. The real rate can be lower when frames take longer than
   * 1/fps to compute or transmit.
   */
  get frameRate(): number {
    return this.config.fps;
  }

  get input(): InputSnapshot {
    return this.controls.snapshot;
  }

  /**
   * Ask the loop to stop. The current frame completes first; a pending
   * wait returns immediately.
   */
  quit(): void {
    this.requestStop('quit');
    if (this.currentState === 'not-started') {
      this.currentState = 'stopped';
    }
  }

  async start(): Promise<SchedulerStats> {
    if (this.currentState !== 'not-started') {
      throw new SchedulerStateError(`Cannot start a scheduler that is ${this.currentState}`);
    }
    this.currentState = 'running';

    try {
      // Grace period for the viewer to attach before the first frame
      if (await this.wait(this.config.warmupMs)) {
        this.game.initialize(this.context());
        this.lastFrameStart = this.clock.now();
        await this.transmit();

        while (!this.stopRequested) {
          await this.runFrame();
        }
      }
    } finally {
      this.currentState = 'stopped';
      await this.closeRenderer();
    }

    return {
      frames: this.frame,
      droppedFrames: this.droppedFrames,
      stopReason: this.stopReason,
    };
  }

  /**
   * A failing close is logged, never thrown, so an error from the game
   * itself still reaches the caller of start()
   */
  private async closeRenderer(): Promise<void> {
    try {
      await this.renderer.close();
    } catch (err) {
      this.logger.error(`[FrameScheduler] Teardown failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private async runFrame(): Promise<void> {
    this.controls.update();
    this.game.gameLoop(this.context());
    await this.transmit();
    await this.pace();

    this.frame++;
    if (this.config.frameLimit !== undefined && this.frame > this.config.frameLimit) {
      this.requestStop('frame-limit');
    }
  }

  private async transmit(): Promise<void> {
    const outcome = await this.renderer.render(encodeFrame(this.board, { encoding: this.config.encoding }));

    switch (outcome.status) {
      case 'ok':
        return;
      case 'transient':
        this.droppedFrames++;
        this.logger.warn(`[FrameScheduler] Frame ${this.frame} dropped: ${outcome.reason}`);
        return;
      case 'connection-lost':
        this.logger.error(`[FrameScheduler] Connection lost: ${outcome.reason}`);
        this.requestStop('connection-lost');
        return;
    }
  }

  private async pace(): Promise<void> {
    const target = 1000 / this.config.fps;
    const elapsed = this.clock.now() - this.lastFrameStart;
    if (elapsed < target) {
      await this.wait(target - elapsed);
    }
    this.lastFrameStart = this.clock.now();
  }

  /**
   * @returns false when the wait was cut short (treated as a stop request)
   */
  private async wait(ms: number): Promise<boolean> {
    if (this.stopRequested) return false;
    const result = await this.clock.sleep(ms, this.abort.signal);
    if (result === 'interrupted') {
      this.requestStop('interrupted');
      return false;
    }
    return true;
  }

  private requestStop(reason: StopReason): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.stopReason = reason;
    this.abort.abort();
  }

  private context(): GameContext {
    return {
      board: this.board,
      controls: this.controls,
      frame: this.frame,
      frameRate: this.config.fps,
      quit: () => this.quit(),
    };
  }
}
