/**
 * Shared mutable game model
 *
 * One instance per game session. Every method must be called while the
 * session's lock is held; the class itself does no locking.
 */

import {
  INITIAL_DIRECTION,
  INITIAL_FOOD,
  INITIAL_SNAKE,
  isDirection,
  type ControlToken,
  type Direction,
  type EndReason,
  type GameSnapshot,
  type Phase,
  type Position,
} from './types';

export interface GameStateInit {
  snake?: readonly Position[];
  food?: Position;
  score?: number;
  direction?: Direction;
}

function copyPosition(p: Position): Position {
  return { row: p.row, col: p.col };
}

export class GameState {
  private snake: Position[];
  private food: Position;
  private score: number;
  private requested: ControlToken | null;
  private previous: Direction;
  private phase: Phase = 'running';
  private tick = 0;
  private endReason: EndReason | null = null;

  constructor(init: GameStateInit = {}) {
    const snake = init.snake ?? INITIAL_SNAKE;
    if (snake.length === 0) {
      throw new Error('Snake needs at least one segment');
    }
    this.snake = snake.map(copyPosition);
    this.food = copyPosition(init.food ?? INITIAL_FOOD);
    this.score = init.score ?? 0;
    this.requested = init.direction ?? INITIAL_DIRECTION;
    this.previous = init.direction ?? INITIAL_DIRECTION;
  }

  snapshot(): GameSnapshot {
    return {
      snake: this.snake.map(copyPosition),
      food: copyPosition(this.food),
      score: this.score,
      requested: this.requested,
      previous: this.previous,
      phase: this.phase,
      tick: this.tick,
      endReason: this.endReason,
    };
  }

  // --------------------------------------------------------------------------
  // Reads used by the loop for decisions
  // --------------------------------------------------------------------------

  get body(): readonly Position[] {
    return this.snake;
  }

  get currentFood(): Position {
    return this.food;
  }

  get currentScore(): number {
    return this.score;
  }

  get currentPhase(): Phase {
    return this.phase;
  }

  get token(): ControlToken | null {
    return this.requested;
  }

  get previousDirection(): Direction {
    return this.previous;
  }

  get ticks(): number {
    return this.tick;
  }

  // --------------------------------------------------------------------------
  // Input write path (InputChannel only)
  // --------------------------------------------------------------------------

  /**
   * Overwrite the requested token with a direction. Reversals are allowed;
   * running back into the body is a loss, not an invalid request.
   *
   * @returns false when `direction` is not a Direction
   */
  requestDirection(direction: unknown): boolean {
    if (!isDirection(direction)) return false;
    this.requested = direction;
    return true;
  }

  requestPause(): void {
    this.requested = 'pause';
  }

  requestExit(): void {
    this.requested = 'exit';
  }

  // --------------------------------------------------------------------------
  // Loop transitions
  // --------------------------------------------------------------------------

  /** Install the result of one tick and remember the direction it moved in */
  commit(snake: Position[], food: Position, score: number, ateFood: boolean, moved: Direction): void {
    if (ateFood && snake.length !== this.snake.length + 1) {
      throw new Error(`Eating must grow the snake by one (was ${this.snake.length}, got ${snake.length})`);
    }
    if (!ateFood && snake.length !== this.snake.length) {
      throw new Error(`Snake length changed without eating (was ${this.snake.length}, got ${snake.length})`);
    }
    this.snake = snake;
    this.food = food;
    this.score = score;
    this.previous = moved;
    this.tick++;
  }

  /** `previous` already holds the last direction moved in; resume restores it */
  beginPause(): void {
    this.requested = null;
    this.phase = 'paused';
  }

  resume(): void {
    this.requested = this.previous;
    this.phase = 'running';
  }

  end(reason: EndReason): void {
    this.phase = 'ended';
    this.endReason = reason;
  }
}
