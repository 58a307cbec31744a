import { describe, it, expect } from 'vitest';
import { ateFood, isSelfCollision, nextFood, nextHead, tickIntervalMs, type RandomSource } from './collision';
import { INITIAL_SNAKE } from './types';

function sequence(values: number[]): RandomSource {
  let i = 0;
  return () => {
    if (i >= values.length) throw new Error('random sequence exhausted');
    return values[i++];
  };
}

describe('nextHead', () => {
  it('moves the head one cell in the requested direction', () => {
    expect(nextHead(INITIAL_SNAKE, 'right')).toEqual({ row: 4, col: 11 });
    expect(nextHead(INITIAL_SNAKE, 'up')).toEqual({ row: 3, col: 10 });
    expect(nextHead(INITIAL_SNAKE, 'down')).toEqual({ row: 5, col: 10 });
  });

  it('wraps from the top row to the bottom row', () => {
    expect(nextHead([{ row: 1, col: 5 }], 'up')).toEqual({ row: 18, col: 5 });
  });

  it('wraps from the bottom row to the top row', () => {
    expect(nextHead([{ row: 18, col: 5 }], 'down')).toEqual({ row: 1, col: 5 });
  });

  it('wraps from the first column to the last', () => {
    expect(nextHead([{ row: 7, col: 1 }], 'left')).toEqual({ row: 7, col: 58 });
  });

  it('wraps from the last column to the first', () => {
    expect(nextHead([{ row: 7, col: 58 }], 'right')).toEqual({ row: 7, col: 1 });
  });

  it('only looks at the head', () => {
    const snake = [{ row: 9, col: 9 }, { row: 1, col: 1 }];
    expect(nextHead(snake, 'left')).toEqual({ row: 9, col: 8 });
  });
});

describe('isSelfCollision', () => {
  it('detects reversing into the neck', () => {
    const head = nextHead(INITIAL_SNAKE, 'left');
    expect(head).toEqual({ row: 4, col: 9 });
    expect(isSelfCollision(head, INITIAL_SNAKE)).toBe(true);
  });

  it('counts the old tail as part of the body', () => {
    const snake = [
      { row: 4, col: 10 },
      { row: 5, col: 10 },
      { row: 5, col: 9 },
      { row: 4, col: 9 },
    ];
    expect(isSelfCollision(nextHead(snake, 'left'), snake)).toBe(true);
  });

  it('is false for a free cell', () => {
    expect(isSelfCollision({ row: 4, col: 11 }, INITIAL_SNAKE)).toBe(false);
  });
});

describe('ateFood', () => {
  it('compares by position', () => {
    expect(ateFood({ row: 10, col: 20 }, { row: 10, col: 20 })).toBe(true);
    expect(ateFood({ row: 10, col: 21 }, { row: 10, col: 20 })).toBe(false);
  });
});

describe('nextFood', () => {
  it('maps random draws onto the playable board', () => {
    expect(nextFood([], sequence([0, 0]))).toEqual({ row: 1, col: 1 });
    expect(nextFood([], sequence([0.999, 0.999]))).toEqual({ row: 18, col: 58 });
  });

  it('redraws until the cell is free', () => {
    // First draw: row 1 + floor(0.17 * 18) = 4, col 1 + floor(0.16 * 58) = 10
    const random = sequence([0.17, 0.16, 0, 0]);
    expect(nextFood(INITIAL_SNAKE, random)).toEqual({ row: 1, col: 1 });
  });

  it('never returns a snake cell', () => {
    let seed = 42;
    const random: RandomSource = () => {
      seed = (Math.imul(seed, 1664525) + 1013904223) >>> 0;
      return seed / 2 ** 32;
    };
    const body = Array.from({ length: 58 }, (_, i) => ({ row: 9, col: i + 1 }));
    for (let i = 0; i < 50; i++) {
      const food = nextFood(body, random);
      expect(food.row).not.toBe(9);
      expect(food.row).toBeGreaterThanOrEqual(1);
      expect(food.row).toBeLessThanOrEqual(18);
      expect(food.col).toBeGreaterThanOrEqual(1);
      expect(food.col).toBeLessThanOrEqual(58);
    }
  });
});

describe('tickIntervalMs', () => {
  it('starts at 150ms for the initial snake', () => {
    expect(tickIntervalMs(3)).toBe(150);
  });

  it('floors both divisions before the modulo', () => {
    expect(tickIntervalMs(50)).toBe(135);
    expect(tickIntervalMs(9)).toBe(149);
    expect(tickIntervalMs(10)).toBe(147);
    expect(tickIntervalMs(14)).toBe(147);
    expect(tickIntervalMs(15)).toBe(146);
  });

  it('resets when the step count reaches 120', () => {
    expect(tickIntervalMs(399)).toBe(32);
    expect(tickIntervalMs(400)).toBe(150);
    expect(tickIntervalMs(480)).toBe(126);
  });

  it('never speeds back down before the reset', () => {
    for (let length = 2; length < 400; length++) {
      expect(tickIntervalMs(length)).toBeLessThanOrEqual(tickIntervalMs(length - 1));
    }
  });
});
