/**
 * Snake core types and board constants
 */

export interface Position {
  row: number;
  col: number;
}

export type Direction = 'up' | 'down' | 'left' | 'right';

/** Unit of input the core consumes, decoupled from raw key codes */
export type ControlToken = Direction | 'pause' | 'exit';

export type Phase = 'running' | 'paused' | 'ended';

export type EndReason = 'exit' | 'collision';

/** Read-only copy of the game state handed to renderers and tests */
export interface GameSnapshot {
  snake: Position[];
  food: Position;
  score: number;
  requested: ControlToken | null;
  previous: Direction;
  phase: Phase;
  tick: number;
  endReason: EndReason | null;
}

export interface GameResult {
  score: number;
  reason: EndReason;
  ticks: number;
}

// ============================================================================
// Board
// ============================================================================

/** Total rows, including the status row */
export const BOARD_HEIGHT = 19;
/** Total columns, including the unused column 0 */
export const BOARD_WIDTH = 59;

export const MIN_ROW = 1;
export const MAX_ROW = BOARD_HEIGHT - 1;
export const MIN_COL = 1;
export const MAX_COL = BOARD_WIDTH - 1;

export const STATUS_ROW = 0;
export const SCORE_COL = 2;
export const HELP_COL = 27;

export const DIRECTION_DELTAS: Record<Direction, Position> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

export const INITIAL_SNAKE: readonly Position[] = [
  { row: 4, col: 10 },
  { row: 4, col: 9 },
  { row: 4, col: 8 },
];

export const INITIAL_FOOD: Position = { row: 10, col: 20 };

export const INITIAL_DIRECTION: Direction = 'right';

// ============================================================================
// Glyphs & text
// ============================================================================

export const GLYPHS = {
  food: '*',
  head: '#',
  empty: ' ',
} as const;

export const HELP_TEXT = ' SNAKE / MOVEMENTs(hjkl) EXIT(i) PAUSE(space) ';

export const END_CREDIT = 'http://bitemelater.in';

export function formatScore(score: number): string {
  return `Score : ${score} `;
}

export function formatFinalScore(score: number): string {
  return `Score - ${score}`;
}

export function isDirection(value: unknown): value is Direction {
  return value === 'up' || value === 'down' || value === 'left' || value === 'right';
}

export function isControlToken(value: unknown): value is ControlToken {
  return isDirection(value) || value === 'pause' || value === 'exit';
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}
