/**
 * Snake
 *
 * Arrows or WASD steer, space restarts after a crash, Q quits.
 */

import type { Game, GameBoard, GameContext } from '../../engine';
import { NamedColor, NamedSymbol } from '../../palette';
import { createSnakeState, step, turn, type Direction, type SnakeState } from './logic';

export const SNAKE_ROWS = 16;
export const SNAKE_COLS = 24;

/** Frames between moves at the start; shrinks as the snake eats */
const START_INTERVAL = 6;
const MIN_INTERVAL = 2;
const DEATH_FLASH_FRAMES = 12;

export interface SnakeGameOptions {
  random?: () => number;
}

export function createSnakeGame(options: SnakeGameOptions = {}): Game {
  const random = options.random ?? Math.random;
  let state: SnakeState;
  let framesUntilMove = START_INTERVAL;
  let deathFlashFrames = 0;

  function reset(board: GameBoard) {
    state = createSnakeState(board.rows, board.cols, random);
    framesUntilMove = START_INTERVAL;
    deathFlashFrames = 0;
  }

  function moveInterval(): number {
    return Math.max(MIN_INTERVAL, START_INTERVAL - Math.floor(state.score / 5));
  }

  function readDirection(context: GameContext): Direction | null {
    const { controls } = context;
    if (controls.up.justPressed || controls.w.justPressed) return 'up';
    if (controls.down.justPressed || controls.s.justPressed) return 'down';
    if (controls.left.justPressed || controls.a.justPressed) return 'left';
    if (controls.right.justPressed || controls.d.justPressed) return 'right';
    return null;
  }

  function draw(board: GameBoard) {
    const flashing = deathFlashFrames > 0 && deathFlashFrames % 4 < 2;
    board.fill({
      background: flashing ? NamedColor.red : NamedColor.navy,
      foreground: NamedColor.white,
      symbol: NamedSymbol.none,
    });

    if (state.food) {
      board.setSymbol(state.food.row, state.food.col, NamedSymbol.heart, NamedColor.red);
    }

    state.body.forEach((segment, i) => {
      const head = i === 0;
      board.setBackground(segment.row, segment.col, state.alive ? NamedColor.green : NamedColor.gray);
      board.setSymbol(
        segment.row,
        segment.col,
        head ? NamedSymbol.circle : NamedSymbol.none,
        head ? NamedColor.yellow : NamedColor.white
      );
    });
  }

  return {
    initialize(context) {
      reset(context.board);
      draw(context.board);
    },

    gameLoop(context) {
      if (context.controls.q.justPressed) {
        context.quit();
        return;
      }

      if (!state.alive) {
        if (deathFlashFrames > 0) deathFlashFrames--;
        if (context.controls.space.justPressed) reset(context.board);
        draw(context.board);
        return;
      }

      const direction = readDirection(context);
      if (direction) turn(state, direction);

      framesUntilMove--;
      if (framesUntilMove <= 0) {
        framesUntilMove = moveInterval();
        if (step(state, random) === 'died') {
          deathFlashFrames = DEATH_FLASH_FRAMES;
        }
      }

      draw(context.board);
    },
  };
}
