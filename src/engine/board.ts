/**
 * Game board
 *
 * A fixed-size grid of cells, each with a background color, a foreground
 * color and a symbol. Colors and symbols are palette indices (see palette/).
 * The grid is stored flat in row-major order, which is also the order the
 * encoder emits.
 */

import { BoundsError, ConfigurationError, InvalidCellValueError } from './errors';

// ============================================================================
// Types
// ============================================================================

export interface Cell {
  background: number;
  foreground: number;
  symbol: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Largest number of cells a board may hold (e.g. 32x32 or 16x64) */
export const MAX_CELLS = 1024;

export const DEFAULT_BACKGROUND = 0; // black
export const DEFAULT_FOREGROUND = 1; // white
export const BLANK_SYMBOL = 0;

export function createDefaultCell(): Cell {
  return {
    background: DEFAULT_BACKGROUND,
    foreground: DEFAULT_FOREGROUND,
    symbol: BLANK_SYMBOL,
  };
}

function isIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function checkValue(field: string, value: number): void {
  if (!isIndex(value)) {
    throw new InvalidCellValueError(field, value);
  }
}

// ============================================================================
// Board
// ============================================================================

export class GameBoard {
  readonly rows: number;
  readonly cols: number;
  private readonly cells: Cell[];

  /**
   * @throws ConfigurationError when either dimension is not a positive
   * integer or the board would exceed MAX_CELLS
   */
  constructor(rows: number, cols: number) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new ConfigurationError(`Board dimensions must be positive integers, got ${rows}x${cols}`);
    }
    if (rows * cols > MAX_CELLS) {
      throw new ConfigurationError(
        `A ${rows}x${cols} board has ${rows * cols} cells; the limit is ${MAX_CELLS} (e.g. 32x32)`
      );
    }

    this.rows = rows;
    this.cols = cols;
    this.cells = Array.from({ length: rows * cols }, createDefaultCell);
  }

  get cellCount(): number {
    return this.cells.length;
  }

  contains(row: number, col: number): boolean {
    return Number.isInteger(row) && Number.isInteger(col) &&
      row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  setBackground(row: number, col: number, color: number): void {
    const cell = this.cellAt(row, col);
    checkValue('background', color);
    cell.background = color;
  }

  setForeground(row: number, col: number, color: number): void {
    const cell = this.cellAt(row, col);
    checkValue('foreground', color);
    cell.foreground = color;
  }

  /**
   * Draw a symbol in the given foreground color
   */
  setSymbol(row: number, col: number, symbol: number, color: number): void {
    const cell = this.cellAt(row, col);
    checkValue('symbol', symbol);
    checkValue('foreground', color);
    cell.symbol = symbol;
    cell.foreground = color;
  }

  /**
   * Returns a copy; mutating it does not touch the board
   */
  get(row: number, col: number): Cell {
    return { ...this.cellAt(row, col) };
  }

  /**
   * Reset every cell to the defaults
   */
  clear(): void {
    for (let i = 0; i < this.cells.length; i++) {
      this.cells[i] = createDefaultCell();
    }
  }

  /**
   * Write the given fields into every cell
   */
  fill(values: Partial<Cell>): void {
    if (values.background !== undefined) checkValue('background', values.background);
    if (values.foreground !== undefined) checkValue('foreground', values.foreground);
    if (values.symbol !== undefined) checkValue('symbol', values.symbol);

    for (const cell of this.cells) {
      Object.assign(cell, values);
    }
  }

  /**
   * Visit cells in row-major order
   */
  forEachCell(visit: (cell: Readonly<Cell>, row: number, col: number) => void): void {
    for (let i = 0; i < this.cells.length; i++) {
      visit(this.cells[i], Math.floor(i / this.cols), i % this.cols);
    }
  }

  private cellAt(row: number, col: number): Cell {
    if (!this.contains(row, col)) {
      throw new BoundsError(row, col, this.rows, this.cols);
    }
    return this.cells[row * this.cols + col];
  }
}
