/**
 * Game registry
 *
 * Each entry knows its board size and builds a fresh Game; launchGame wires
 * one to a board and a scheduler.
 */

import { FrameScheduler, GameBoard, type FrameSchedulerOptions, type Game } from '../engine';
import { createSketchGame, SKETCH_COLS, SKETCH_ROWS } from './sketch';
import { createSnakeGame, SNAKE_COLS, SNAKE_ROWS } from './snake';

/**
 * Game registry with metadata
 */
export interface GameInfo {
  id: string;
  name: string;
  description: string;
  rows: number;
  cols: number;
  create: () => Game;
}

export const games: GameInfo[] = [
  { id: 'snake', name: 'Snake', description: 'Eat and grow', rows: SNAKE_ROWS, cols: SNAKE_COLS, create: () => createSnakeGame() },
  { id: 'sketch', name: 'Sketch', description: 'Paint on the grid', rows: SKETCH_ROWS, cols: SKETCH_COLS, create: createSketchGame },
];

/**
 * Get a game by ID
 */
export function getGame(id: string): GameInfo | undefined {
  return games.find(g => g.id === id);
}

export type LaunchOptions = Omit<FrameSchedulerOptions, 'board' | 'game'>;

/**
 * Build a board and scheduler for a game. Call start() on the result.
 */
export function launchGame(info: GameInfo, options: LaunchOptions): FrameScheduler {
  return new FrameScheduler({
    ...options,
    board: new GameBoard(info.rows, info.cols),
    game: info.create(),
  });
}

export { createSnakeGame, createSketchGame };
export type { SketchGame, SketchState } from './sketch';
export type { SnakeGameOptions } from './snake';
