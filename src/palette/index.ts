/**
 * Palette
 *
 * Boards store small integers; this module gives them names and maps them
 * to RGB colors and terminal glyphs. Index 0 of each table is the default
 * (black background, blank symbol), index 1 of the colors is white.
 */

// ============================================================================
// Colors
// ============================================================================

export interface PaletteColor {
  name: string;
  /** Hex, e.g. #FF8800 */
  hex: string;
}

export const COLORS: readonly PaletteColor[] = [
  { name: 'black', hex: '#000000' },
  { name: 'white', hex: '#FFFFFF' },
  { name: 'red', hex: '#E53935' },
  { name: 'green', hex: '#43A047' },
  { name: 'blue', hex: '#1E88E5' },
  { name: 'yellow', hex: '#FDD835' },
  { name: 'cyan', hex: '#00D9FF' },
  { name: 'magenta', hex: '#D81B60' },
  { name: 'orange', hex: '#FB8C00' },
  { name: 'purple', hex: '#8E24AA' },
  { name: 'brown', hex: '#6D4C41' },
  { name: 'gray', hex: '#757575' },
  { name: 'darkgray', hex: '#303030' },
  { name: 'lightsalmon', hex: '#FFA07A' },
  { name: 'darkgreen', hex: '#1B5E20' },
  { name: 'navy', hex: '#0D1E38' },
];

export const NamedColor = {
  black: 0,
  white: 1,
  red: 2,
  green: 3,
  blue: 4,
  yellow: 5,
  cyan: 6,
  magenta: 7,
  orange: 8,
  purple: 9,
  brown: 10,
  gray: 11,
  darkgray: 12,
  lightsalmon: 13,
  darkgreen: 14,
  navy: 15,
} as const;

export type ColorName = keyof typeof NamedColor;

// ============================================================================
// Symbols
// ============================================================================

export const SYMBOLS: readonly string[] = [
  ' ', // none
  '█', '▓', '░', '●', '○', '◆', '◇', '■', '□',
  '▲', '▼', '◀', '▶', '★', '✦', '♥', '♦', '♣', '♠',
  '@', '#', '+', 'x', '*', '~', '=', '·',
];

export const NamedSymbol = {
  none: 0,
  block: 1,
  shade: 2,
  lightShade: 3,
  circle: 4,
  ring: 5,
  diamond: 6,
  diamondOutline: 7,
  square: 8,
  squareOutline: 9,
  triangleUp: 10,
  triangleDown: 11,
  triangleLeft: 12,
  triangleRight: 13,
  star: 14,
  sparkle: 15,
  heart: 16,
  diamondSuit: 17,
  club: 18,
  spade: 19,
  at: 20,
  hash: 21,
  plus: 22,
  cross: 23,
  asterisk: 24,
  wave: 25,
  equals: 26,
  dot: 27,
} as const;

export type SymbolName = keyof typeof NamedSymbol;

// ============================================================================
// Lookups
// ============================================================================

export function getColor(index: number): PaletteColor {
  return COLORS[index] ?? COLORS[0];
}

export function getGlyph(index: number): string {
  return SYMBOLS[index] ?? SYMBOLS[0];
}

export function hexToRgb(hex: string): [number, number, number] {
  const value = parseInt(hex.slice(1), 16);
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

/**
 * Truecolor escape for a background palette index
 */
export function ansiBackground(index: number): string {
  const [r, g, b] = hexToRgb(getColor(index).hex);
  return `\x1b[48;2;${r};${g};${b}m`;
}

/**
 * Truecolor escape for a foreground palette index
 */
export function ansiForeground(index: number): string {
  const [r, g, b] = hexToRgb(getColor(index).hex);
  return `\x1b[38;2;${r};${g};${b}m`;
}

export const ANSI_RESET = '\x1b[0m';
