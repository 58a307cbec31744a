/**
 * Pure movement and collision rules for the snake board.
 * Extracted for testability; nothing here touches shared state.
 */

import {
  DIRECTION_DELTAS,
  MAX_COL,
  MAX_ROW,
  MIN_COL,
  MIN_ROW,
  samePosition,
  type Direction,
  type Position,
} from './types';

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

/**
 * Compute the next head position, wrapping toroidally at every edge
 *
 * @param snake - Current body, head first
 * @param direction - Direction of travel this tick
 */
export function nextHead(snake: readonly Position[], direction: Direction): Position {
  const head = snake[0];
  const delta = DIRECTION_DELTAS[direction];
  let row = head.row + delta.row;
  let col = head.col + delta.col;

  if (row < MIN_ROW) row = MAX_ROW;
  if (row > MAX_ROW) row = MIN_ROW;
  if (col < MIN_COL) col = MAX_COL;
  if (col > MAX_COL) col = MIN_COL;

  return { row, col };
}

/**
 * Check whether the new head lands on the body as it was before this tick
 * moved (old tail included)
 */
export function isSelfCollision(newHead: Position, body: readonly Position[]): boolean {
  return body.some(segment => samePosition(segment, newHead));
}

export function ateFood(newHead: Position, food: Position): boolean {
  return samePosition(newHead, food);
}

/**
 * Draw food positions uniformly over the playable board until one lands
 * off the excluded cells. There is no retry cap: the board cannot fill up.
 */
export function nextFood(excluded: readonly Position[], random: RandomSource = Math.random): Position {
  const occupied = new Set(excluded.map(p => `${p.row},${p.col}`));
  let food: Position;
  do {
    food = {
      row: MIN_ROW + Math.floor(random() * (MAX_ROW - MIN_ROW + 1)),
      col: MIN_COL + Math.floor(random() * (MAX_COL - MIN_COL + 1)),
    };
  } while (occupied.has(`${food.row},${food.col}`));
  return food;
}

/**
 * Delay between ticks for a snake of the given length, in milliseconds.
 * Both divisions floor before the modulo, so the curve speeds up in steps
 * and resets every time the sum passes a multiple of 120.
 */
export function tickIntervalMs(snakeLength: number): number {
  const steps = Math.floor(snakeLength / 5) + Math.floor(snakeLength / 10);
  return 150 - (steps % 120);
}
