/**
 * Terminal surface and alternate screen state
 *
 * The renderer paints into an xterm.js terminal or anything shaped like one
 * (the CLI's stdout adapter). Screen state is kept per terminal, so
 * renderers sharing a terminal switch screens once.
 */

import type { Terminal } from '@xterm/xterm';
import { ANSI_RESET } from '../palette';

/**
 * The part of an xterm.js Terminal a renderer needs
 */
export type TerminalSurface = Pick<Terminal, 'write' | 'cols' | 'rows'> & {
  /** null once the terminal has been disposed */
  readonly element?: unknown;
};

/** Alternate screen, hidden cursor, cleared */
export const ENTER_ALTERNATE_SCREEN = '\x1b[?1049h\x1b[?25l\x1b[2J\x1b[H';
/** Reset colors, main screen, cursor shown */
export const LEAVE_ALTERNATE_SCREEN = `${ANSI_RESET}\x1b[?1049l\x1b[?25h`;

const alternateScreens = new WeakSet<TerminalSurface>();

export function isTerminalValid(terminal: TerminalSurface | null | undefined): terminal is TerminalSurface {
  return terminal !== null && terminal !== undefined && terminal.element !== null;
}

/**
 * @returns false if the terminal was already on the alternate screen
 */
export function enterAlternateBuffer(terminal: TerminalSurface): boolean {
  if (alternateScreens.has(terminal)) return false;
  terminal.write(ENTER_ALTERNATE_SCREEN);
  alternateScreens.add(terminal);
  return true;
}

/**
 * Forget the alternate screen and, if the terminal is still alive, switch
 * back to the main one.
 *
 * @returns false if the terminal was not on the alternate screen
 */
export function exitAlternateBuffer(terminal: TerminalSurface): boolean {
  if (!alternateScreens.delete(terminal)) return false;
  if (isTerminalValid(terminal)) {
    terminal.write(LEAVE_ALTERNATE_SCREEN);
  }
  return true;
}

export function isInAlternateBuffer(terminal: TerminalSurface): boolean {
  return alternateScreens.has(terminal);
}
