/**
 * Pure snake rules, kept apart from drawing for testability
 */

export type Direction = 'up' | 'down' | 'left' | 'right';

export interface Point {
  row: number;
  col: number;
}

export interface SnakeState {
  rows: number;
  cols: number;
  /** Head first */
  body: Point[];
  direction: Direction;
  /** Applied on the next step, so two quick turns cannot reverse the snake */
  nextDirection: Direction;
  food: Point | null;
  score: number;
  alive: boolean;
}

export type StepResult = 'moved' | 'ate' | 'died';

const OFFSETS: Record<Direction, Point> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

const OPPOSITE: Record<Direction, Direction> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

export const INITIAL_LENGTH = 3;

export function createSnakeState(rows: number, cols: number, random: () => number = Math.random): SnakeState {
  const length = Math.min(INITIAL_LENGTH, cols);
  const row = Math.floor(rows / 2);
  const col = Math.max(Math.floor(cols / 2), length - 1);
  const body: Point[] = [];
  for (let i = 0; i < length; i++) {
    body.push({ row, col: col - i });
  }

  const state: SnakeState = {
    rows,
    cols,
    body,
    direction: 'right',
    nextDirection: 'right',
    food: null,
    score: 0,
    alive: true,
  };
  state.food = placeFood(state, random);
  return state;
}

/**
 * Queue a turn. Reversing onto the neck is ignored.
 */
export function turn(state: SnakeState, direction: Direction): void {
  if (direction !== OPPOSITE[state.direction]) {
    state.nextDirection = direction;
  }
}

export function occupies(body: readonly Point[], point: Point): boolean {
  return body.some(p => p.row === point.row && p.col === point.col);
}

/**
 * Pick a random free cell, or null when the snake fills the board
 */
export function placeFood(state: SnakeState, random: () => number = Math.random): Point | null {
  const free: Point[] = [];
  for (let row = 0; row < state.rows; row++) {
    for (let col = 0; col < state.cols; col++) {
      if (!occupies(state.body, { row, col })) free.push({ row, col });
    }
  }
  if (free.length === 0) return null;
  return free[Math.floor(random() * free.length)];
}

export function step(state: SnakeState, random: () => number = Math.random): StepResult {
  if (!state.alive) return 'died';

  state.direction = state.nextDirection;
  const offset = OFFSETS[state.direction];
  const head = state.body[0];
  const next = { row: head.row + offset.row, col: head.col + offset.col };

  const outside = next.row < 0 || next.row >= state.rows || next.col < 0 || next.col >= state.cols;
  const eating = state.food !== null && next.row === state.food.row && next.col === state.food.col;
  // The tail moves out of the way unless the snake grows this step
  const obstacles = eating ? state.body : state.body.slice(0, -1);

  if (outside || occupies(obstacles, next)) {
    state.alive = false;
    return 'died';
  }

  state.body.unshift(next);
  if (eating) {
    state.score++;
    state.food = placeFood(state, random);
    return 'ate';
  }
  state.body.pop();
  return 'moved';
}
