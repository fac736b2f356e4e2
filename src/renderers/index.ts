export { TerminalRenderer, CELL_WIDTH } from './terminal';
export type { TerminalRendererOptions } from './terminal';
export { enterAlternateBuffer, exitAlternateBuffer, isInAlternateBuffer, isTerminalValid } from './buffer';
export type { TerminalSurface } from './buffer';
