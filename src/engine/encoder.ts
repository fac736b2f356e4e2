/**
 * Frame encoder
 *
 * Turns a GameBoard into the per-frame wire record: three row-major
 * channels (background, foreground, symbol) plus the board dimensions.
 * Each channel is sent either raw or run-length encoded. Nothing is kept
 * between calls; every frame is encoded from scratch.
 */

import { MAX_CELLS, type Cell, type GameBoard } from './board';
import { FrameDecodeError } from './errors';

// ============================================================================
// Types
// ============================================================================

export type FrameEncoding = 'raw' | 'rle';

/** [value, count] */
export type Run = readonly [value: number, count: number];

export type Channel =
  | { encoding: 'raw'; values: number[] }
  | { encoding: 'rle'; runs: Run[] };

export interface EncodedFrame {
  dimensions: [rows: number, cols: number];
  background: Channel;
  foreground: Channel;
  symbol: Channel;
}

export interface DecodedFrame {
  rows: number;
  cols: number;
  /** Row-major */
  cells: Cell[];
}

export interface EncodeOptions {
  encoding?: FrameEncoding;
}

// ============================================================================
// Run-length encoding
// ============================================================================

/**
 * Collapse maximal runs of equal values into [value, count] pairs
 */
export function runLengthEncode(values: readonly number[]): Run[] {
  const runs: Run[] = [];
  let i = 0;
  while (i < values.length) {
    const value = values[i];
    let count = 1;
    while (i + count < values.length && values[i + count] === value) {
      count++;
    }
    runs.push([value, count]);
    i += count;
  }
  return runs;
}

/**
 * Expand runs back into values. Throws before allocating once the total
 * would pass `maxLength`.
 */
export function runLengthDecode(runs: readonly Run[], maxLength: number = MAX_CELLS): number[] {
  const values: number[] = [];
  for (const [value, count] of runs) {
    if (!Number.isSafeInteger(count) || count <= 0) {
      throw new FrameDecodeError(`Run count must be a positive integer, got ${count}`);
    }
    if (values.length + count > maxLength) {
      throw new FrameDecodeError(`Runs expand past ${maxLength} values`);
    }
    for (let i = 0; i < count; i++) values.push(value);
  }
  return values;
}

/**
 * Text form of a run list: "3x5,1x2" (value x count)
 */
export function formatRuns(runs: readonly Run[]): string {
  return runs.map(([value, count]) => `${value}x${count}`).join(',');
}

export function parseRuns(text: string): Run[] {
  if (text === '') return [];
  return text.split(',').map(part => {
    const match = /^(\d+)x(\d+)$/.exec(part.trim());
    if (!match) {
      throw new FrameDecodeError(`Malformed run "${part}"`);
    }
    const run: Run = [Number(match[1]), Number(match[2])];
    if (!Number.isSafeInteger(run[0]) || !Number.isSafeInteger(run[1]) || run[1] === 0) {
      throw new FrameDecodeError(`Malformed run "${part}"`);
    }
    return run;
  });
}

// ============================================================================
// Encode
// ============================================================================

function toChannel(values: number[], encoding: FrameEncoding): Channel {
  return encoding === 'rle'
    ? { encoding: 'rle', runs: runLengthEncode(values) }
    : { encoding: 'raw', values };
}

export function encodeFrame(board: GameBoard, options: EncodeOptions = {}): EncodedFrame {
  const encoding = options.encoding ?? 'raw';
  const background: number[] = [];
  const foreground: number[] = [];
  const symbol: number[] = [];

  board.forEachCell(cell => {
    background.push(cell.background);
    foreground.push(cell.foreground);
    symbol.push(cell.symbol);
  });

  return {
    dimensions: [board.rows, board.cols],
    background: toChannel(background, encoding),
    foreground: toChannel(foreground, encoding),
    symbol: toChannel(symbol, encoding),
  };
}

// ============================================================================
// Decode
// ============================================================================

function expandChannel(name: string, channel: Channel, length: number): number[] {
  const values = channel.encoding === 'rle' ? runLengthDecode(channel.runs, length) : channel.values;
  if (values.length !== length) {
    throw new FrameDecodeError(`Channel ${name} has ${values.length} values, expected ${length}`);
  }
  for (const value of values) {
    if (!Number.isInteger(value) || value < 0) {
      throw new FrameDecodeError(`Channel ${name} holds invalid value ${value}`);
    }
  }
  return values;
}

export function decodeFrame(frame: EncodedFrame): DecodedFrame {
  const [rows, cols] = frame.dimensions;
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
    throw new FrameDecodeError(`Invalid dimensions ${rows}x${cols}`);
  }
  if (rows * cols > MAX_CELLS) {
    throw new FrameDecodeError(`A ${rows}x${cols} frame has more than ${MAX_CELLS} cells`);
  }

  const length = rows * cols;
  const background = expandChannel('background', frame.background, length);
  const foreground = expandChannel('foreground', frame.foreground, length);
  const symbol = expandChannel('symbol', frame.symbol, length);

  const cells: Cell[] = [];
  for (let i = 0; i < length; i++) {
    cells.push({ background: background[i], foreground: foreground[i], symbol: symbol[i] });
  }
  return { rows, cols, cells };
}

// ============================================================================
// Wire text
// ============================================================================

/**
 * JSON wire text. Raw channels are number arrays, RLE channels are
 * "value x count" strings.
 */
export function serializeFrame(frame: EncodedFrame): string {
  const channel = (c: Channel) => (c.encoding === 'rle' ? formatRuns(c.runs) : c.values);
  return JSON.stringify({
    background: channel(frame.background),
    foreground: channel(frame.foreground),
    symbol: channel(frame.symbol),
    dimensions: frame.dimensions,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readChannel(name: string, value: unknown): Channel {
  if (typeof value === 'string') {
    return { encoding: 'rle', runs: parseRuns(value) };
  }
  if (Array.isArray(value)) {
    const values: number[] = [];
    for (const item of value) {
      if (typeof item !== 'number') {
        throw new FrameDecodeError(`Channel ${name} holds a non-numeric value`);
      }
      values.push(item);
    }
    return { encoding: 'raw', values };
  }
  throw new FrameDecodeError(`Channel ${name} is missing`);
}

export function parseFrame(text: string): EncodedFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new FrameDecodeError(`Frame is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new FrameDecodeError('Frame must be a JSON object');
  }

  const dims = parsed.dimensions;
  if (!Array.isArray(dims) || dims.length !== 2 || typeof dims[0] !== 'number' || typeof dims[1] !== 'number') {
    throw new FrameDecodeError('Frame dimensions must be [rows, cols]');
  }

  const frame: EncodedFrame = {
    dimensions: [dims[0], dims[1]],
    background: readChannel('background', parsed.background),
    foreground: readChannel('foreground', parsed.foreground),
    symbol: readChannel('symbol', parsed.symbol),
  };
  // Validate lengths and values up front
  decodeFrame(frame);
  return frame;
}
