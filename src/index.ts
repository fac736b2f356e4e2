/**
 * gridloop
 *
 * Frame-paced grid games: a bounded color/symbol board, per-frame keyboard
 * edges, a frame codec and a fixed-rate scheduler.
 *
 * Library usage (xterm.js):
 *   import { games, launchGame, TerminalRenderer } from 'gridloop';
 *   const scheduler = launchGame(games[0], { renderer: new TerminalRenderer(terminal) });
 *   await scheduler.start();
 *
 * CLI usage:
 *   npx gridloop
 */

export * from './engine';

export {
  // Palette
  COLORS,
  SYMBOLS,
  NamedColor,
  NamedSymbol,
  getColor,
  getGlyph,
  hexToRgb,
  ansiBackground,
  ansiForeground,
  ANSI_RESET,
  type PaletteColor,
  type ColorName,
  type SymbolName,
} from './palette';

export {
  // Terminal rendering
  TerminalRenderer,
  CELL_WIDTH,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  isTerminalValid,
  type TerminalRendererOptions,
  type TerminalSurface,
} from './renderers';

export {
  // Game registry
  games,
  getGame,
  launchGame,
  createSnakeGame,
  createSketchGame,
  type GameInfo,
  type LaunchOptions,
  type SketchGame,
  type SketchState,
  type SnakeGameOptions,
} from './games';

export {
  // Keyboard adapter
  attachKeyboard,
  parseKey,
  splitKeys,
  DEFAULT_RELEASE_MS,
  ESCAPE_TIMEOUT_MS,
  type SplitKeys,
  type KeySource,
  type KeyboardOptions,
} from './keyboard';
