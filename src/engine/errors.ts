/**
 * Engine error types
 *
 * Every failure the engine reports is a GridLoopError with a stable `code`,
 * so callers can branch on it without matching messages.
 */

export type GridLoopErrorCode =
  | 'CONFIGURATION'
  | 'OUT_OF_BOUNDS'
  | 'INVALID_CELL_VALUE'
  | 'FRAME_DECODE'
  | 'SCHEDULER_STATE';

export class GridLoopError extends Error {
  readonly code: GridLoopErrorCode;

  constructor(code: GridLoopErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid engine or board configuration (e.g. a board over the cell cap).
 */
export class ConfigurationError extends GridLoopError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

/**
 * A cell accessor was called with a row/col outside the board.
 */
export class BoundsError extends GridLoopError {
  readonly row: number;
  readonly col: number;
  readonly rows: number;
  readonly cols: number;

  constructor(row: number, col: number, rows: number, cols: number) {
    super('OUT_OF_BOUNDS', `Cell (${row}, ${col}) is outside the ${rows}x${cols} board`);
    this.row = row;
    this.col = col;
    this.rows = rows;
    this.cols = cols;
  }
}

export class InvalidCellValueError extends GridLoopError {
  readonly field: string;
  readonly value: number;

  constructor(field: string, value: number) {
    super('INVALID_CELL_VALUE', `${field} must be a non-negative integer, got ${value}`);
    this.field = field;
    this.value = value;
  }
}

export class FrameDecodeError extends GridLoopError {
  constructor(message: string) {
    super('FRAME_DECODE', message);
  }
}

export class SchedulerStateError extends GridLoopError {
  constructor(message: string) {
    super('SCHEDULER_STATE', message);
  }
}
