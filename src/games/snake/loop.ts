/**
 * Snake game loop
 *
 * Drives the simulation as an async task sharing one lock with the input
 * path. Each tick reads the requested token, moves, and commits while the
 * lock is held; drawing and sleeping happen after it is released.
 */

import { Mutex } from '../shared/mutex';
import { sleep as defaultSleep, type Sleep } from '../shared/sleep';
import { ateFood, isSelfCollision, nextFood, nextHead, tickIntervalMs, type RandomSource } from './collision';
import { InputChannel } from './input';
import type { CellUpdate, RenderSink } from './render';
import { GameState, type GameStateInit } from './state';
import {
  END_CREDIT,
  GLYPHS,
  HELP_COL,
  HELP_TEXT,
  SCORE_COL,
  STATUS_ROW,
  formatFinalScore,
  formatScore,
  type EndReason,
  type GameResult,
  type GameSnapshot,
  type Position,
} from './types';

/** How long the pause wait sleeps between checks when no key arrives */
export const PAUSE_POLL_MS = 100;

export interface GameLoopOptions {
  state: GameState;
  input: InputChannel;
  lock: Mutex;
  sink: RenderSink;
  random?: RandomSource;
  sleep?: Sleep;
  pausePollMs?: number;
}

type Step =
  | { kind: 'moved'; updates: CellUpdate[]; delayMs: number }
  | { kind: 'paused' }
  | { kind: 'ended'; result: GameResult };

function cell(p: Position, text: string): CellUpdate {
  return { row: p.row, col: p.col, text };
}

function statusUpdates(score: number): CellUpdate[] {
  return [
    { row: STATUS_ROW, col: SCORE_COL, text: formatScore(score) },
    { row: STATUS_ROW, col: HELP_COL, text: HELP_TEXT },
  ];
}

export class GameLoop {
  private readonly state: GameState;
  private readonly input: InputChannel;
  private readonly lock: Mutex;
  private readonly sink: RenderSink;
  private readonly random: RandomSource;
  private readonly sleep: Sleep;
  private readonly pausePollMs: number;
  private started = false;

  constructor(options: GameLoopOptions) {
    this.state = options.state;
    this.input = options.input;
    this.lock = options.lock;
    this.sink = options.sink;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.pausePollMs = options.pausePollMs ?? PAUSE_POLL_MS;
  }

  /**
   * Run until the player exits or the snake runs into itself.
   * Can only be called once per loop.
   */
  async run(): Promise<GameResult> {
    if (this.started) {
      throw new Error('Game loop already started');
    }
    this.started = true;

    const opening = await this.lock.runExclusive(() => this.openingUpdates());
    this.apply(opening);
    this.sink.notify('update-screen');

    for (;;) {
      const step = await this.lock.runExclusive(() => this.step());

      if (step.kind === 'paused') {
        await this.waitWhilePaused();
        continue;
      }

      if (step.kind === 'ended') {
        this.sink.showSummary([formatFinalScore(step.result.score), END_CREDIT]);
        this.sink.notify('end-game');
        return step.result;
      }

      this.apply(step.updates);
      this.sink.notify('update-screen');
      await this.sleep(step.delayMs);
    }
  }

  /** Ask the loop to end at its next tick or pause check */
  stop(): Promise<void> {
    return this.input.send('exit');
  }

  private openingUpdates(): CellUpdate[] {
    const snapshot = this.state.snapshot();
    return [
      cell(snapshot.food, GLYPHS.food),
      ...snapshot.snake.map(segment => cell(segment, GLYPHS.head)),
      ...statusUpdates(snapshot.score),
    ];
  }

  /** One logical step; runs with the lock held and must not await */
  private step(): Step {
    const token = this.state.token;

    if (token === 'exit') {
      return this.end('exit');
    }

    if (token === 'pause') {
      this.state.beginPause();
      return { kind: 'paused' };
    }

    const direction = token ?? this.state.previousDirection;
    const body = this.state.body;
    const head = nextHead(body, direction);

    if (isSelfCollision(head, body)) {
      return this.end('collision');
    }

    const snake = [head, ...body];
    // Speed follows the length with the new head in, before the tail is trimmed
    const delayMs = tickIntervalMs(snake.length);
    const updates: CellUpdate[] = [];

    let food = this.state.currentFood;
    let score = this.state.currentScore;
    const eaten = ateFood(head, food);

    if (eaten) {
      score += 1;
      food = nextFood(snake, this.random);
      updates.push(cell(food, GLYPHS.food));
    } else {
      const tail = snake[snake.length - 1];
      snake.pop();
      updates.push(cell(tail, GLYPHS.empty));
    }

    updates.push(cell(head, GLYPHS.head), ...statusUpdates(score));
    this.state.commit(snake, food, score, eaten, direction);

    return { kind: 'moved', updates, delayMs };
  }

  private end(reason: EndReason): Step {
    this.state.end(reason);
    return {
      kind: 'ended',
      result: { score: this.state.currentScore, reason, ticks: this.state.ticks },
    };
  }

  /**
   * Wait for a second pause (resume) or an exit. Wakes on every send and
   * at least once per poll interval; a pause/resume cycle consumes no tick.
   */
  private async waitWhilePaused(): Promise<void> {
    for (;;) {
      await this.input.waitForSend(this.pausePollMs);
      const done = await this.lock.runExclusive(() => {
        const token = this.state.token;
        if (token === 'pause') {
          this.state.resume();
          return true;
        }
        // Exit is left in the slot; the next step ends the game
        return token === 'exit';
      });
      if (done) return;
    }
  }

  private apply(updates: readonly CellUpdate[]): void {
    for (const update of updates) {
      this.sink.applyCellUpdate(update.row, update.col, update.text);
    }
  }
}

// ============================================================================
// Session factory
// ============================================================================

export interface SnakeGameOptions {
  random?: RandomSource;
  sleep?: Sleep;
  pausePollMs?: number;
  initial?: GameStateInit;
}

/**
 * One game: state, lock, input channel and loop wired together
 */
export interface SnakeGame {
  readonly input: InputChannel;
  readonly loop: GameLoop;
  run: () => Promise<GameResult>;
  stop: () => Promise<void>;
  snapshot: () => Promise<GameSnapshot>;
}

export function createSnakeGame(sink: RenderSink, options: SnakeGameOptions = {}): SnakeGame {
  const lock = new Mutex();
  const state = new GameState(options.initial);
  const sleep = options.sleep ?? defaultSleep;
  const input = new InputChannel(state, lock, sleep);
  const loop = new GameLoop({
    state,
    input,
    lock,
    sink,
    random: options.random,
    sleep,
    pausePollMs: options.pausePollMs,
  });

  return {
    input,
    loop,
    run: () => loop.run(),
    stop: () => loop.stop(),
    snapshot: () => lock.runExclusive(() => state.snapshot()),
  };
}
