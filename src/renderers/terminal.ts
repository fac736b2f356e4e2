/**
 * Terminal renderer
 *
 * Paints encoded frames into a terminal, two columns per cell, centered.
 * Color escapes are only emitted when the color changes from the previous
 * cell, so uniform regions cost one escape per run.
 */

import {
  decodeFrame,
  FrameDecodeError,
  type DecodedFrame,
  type EncodedFrame,
  type FrameRenderer,
  type Logger,
  type RenderOutcome,
} from '../engine';
import { ANSI_RESET, ansiBackground, ansiForeground, getGlyph } from '../palette';
import { enterAlternateBuffer, exitAlternateBuffer, isInAlternateBuffer, isTerminalValid, type TerminalSurface } from './buffer';

export const CELL_WIDTH = 2;

export interface TerminalRendererOptions {
  logger?: Logger;
}

export class TerminalRenderer implements FrameRenderer {
  private readonly terminal: TerminalSurface;
  private readonly logger: Logger;
  private lastSize = '';

  constructor(terminal: TerminalSurface, options: TerminalRendererOptions = {}) {
    this.terminal = terminal;
    this.logger = options.logger ?? console;
  }

  render(frame: EncodedFrame): RenderOutcome {
    if (!isTerminalValid(this.terminal)) {
      return { status: 'connection-lost', reason: 'terminal disposed' };
    }

    let decoded: DecodedFrame;
    try {
      decoded = decodeFrame(frame);
    } catch (err) {
      if (err instanceof FrameDecodeError) {
        return { status: 'transient', reason: err.message };
      }
      throw err;
    }

    enterAlternateBuffer(this.terminal);

    const { rows, cols, cells } = decoded;
    const width = cols * CELL_WIDTH;
    const termCols = this.terminal.cols;
    const termRows = this.terminal.rows;

    let output = '';
    const size = `${termCols}x${termRows}`;
    if (this.lastSize !== '' && this.lastSize !== size) {
      output += '\x1b[2J';
    }
    this.lastSize = size;

    if (termCols < width || termRows < rows) {
      this.terminal.write(
        output + '\x1b[H' + ANSI_RESET + `Terminal too small! Need ${width}x${rows}, have ${termCols}x${termRows}`
      );
      return { status: 'transient', reason: `terminal is ${termCols}x${termRows}, board needs ${width}x${rows}` };
    }

    const top = Math.floor((termRows - rows) / 2) + 1;
    const left = Math.floor((termCols - width) / 2) + 1;

    let lastBackground = -1;
    let lastForeground = -1;
    for (let r = 0; r < rows; r++) {
      output += `\x1b[${top + r};${left}H`;
      for (let c = 0; c < cols; c++) {
        const cell = cells[r * cols + c];
        if (cell.background !== lastBackground) {
          output += ansiBackground(cell.background);
          lastBackground = cell.background;
        }
        if (cell.foreground !== lastForeground) {
          output += ansiForeground(cell.foreground);
          lastForeground = cell.foreground;
        }
        output += getGlyph(cell.symbol) + ' ';
      }
    }
    output += ANSI_RESET;

    this.terminal.write(output);
    return { status: 'ok' };
  }

  close(): void {
    if (!isInAlternateBuffer(this.terminal)) return;
    if (!isTerminalValid(this.terminal)) {
      this.logger.warn('[TerminalRenderer] Terminal disposed before leaving the alternate screen');
    }
    exitAlternateBuffer(this.terminal);
  }
}
