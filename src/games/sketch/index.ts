/**
 * Sketch
 *
 * Move the cursor with the arrows (holding a key auto-repeats), hold space
 * to paint, W/S cycle the paint color, A cycles the brush symbol, D erases
 * under the cursor, Q quits.
 */

import type { Cell, Game, GameBoard, GameContext } from '../../engine';
import { createDefaultCell } from '../../engine';
import { COLORS, NamedColor, NamedSymbol, SYMBOLS } from '../../palette';

export const SKETCH_ROWS = 24;
export const SKETCH_COLS = 32;

/** Frames between cursor steps while an arrow is held */
export const CURSOR_REPEAT = 3;

export interface SketchState {
  row: number;
  col: number;
  color: number;
  symbol: number;
  /** Painted cells, row-major */
  canvas: Cell[];
}

export interface SketchGame extends Game {
  readonly state: SketchState;
}

function wrap(value: number, size: number): number {
  return ((value % size) + size) % size;
}

export function createSketchGame(): SketchGame {
  const state: SketchState = {
    row: 0,
    col: 0,
    color: NamedColor.cyan,
    symbol: NamedSymbol.none,
    canvas: [],
  };

  function moveCursor(context: GameContext) {
    const { controls, board } = context;
    if (controls.up.fire()) state.row = Math.max(0, state.row - 1);
    if (controls.down.fire()) state.row = Math.min(board.rows - 1, state.row + 1);
    if (controls.left.fire()) state.col = Math.max(0, state.col - 1);
    if (controls.right.fire()) state.col = Math.min(board.cols - 1, state.col + 1);
  }

  function draw(board: GameBoard) {
    state.canvas.forEach((cell, i) => {
      const row = Math.floor(i / board.cols);
      const col = i % board.cols;
      board.setBackground(row, col, cell.background);
      board.setSymbol(row, col, cell.symbol, cell.foreground);
    });

    // Cursor crosshair, kept visible against a white brush
    board.setSymbol(state.row, state.col, NamedSymbol.plus, state.color === NamedColor.white ? NamedColor.black : NamedColor.white);
  }

  return {
    state,

    initialize(context) {
      const { board, controls } = context;
      state.row = Math.floor(board.rows / 2);
      state.col = Math.floor(board.cols / 2);
      state.canvas = Array.from({ length: board.cellCount }, createDefaultCell);
      controls.up.setFireCooldown(CURSOR_REPEAT);
      controls.down.setFireCooldown(CURSOR_REPEAT);
      controls.left.setFireCooldown(CURSOR_REPEAT);
      controls.right.setFireCooldown(CURSOR_REPEAT);
      controls.space.setFireCooldown(0);
      draw(board);
    },

    gameLoop(context) {
      const { controls, board } = context;
      if (controls.q.justPressed) {
        context.quit();
        return;
      }

      if (controls.w.justPressed) state.color = wrap(state.color + 1, COLORS.length);
      if (controls.s.justPressed) state.color = wrap(state.color - 1, COLORS.length);
      if (controls.a.justPressed) state.symbol = wrap(state.symbol + 1, SYMBOLS.length);

      moveCursor(context);

      const index = state.row * board.cols + state.col;
      if (controls.space.fire()) {
        state.canvas[index] = {
          background: state.color,
          foreground: NamedColor.white,
          symbol: state.symbol,
        };
      }
      if (controls.d.pressed) {
        state.canvas[index] = createDefaultCell();
      }

      draw(board);
    },
  };
}
