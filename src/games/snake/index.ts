/**
 * Snake
 *
 * Classic wraparound snake: hjkl or arrows to move, space to pause,
 * i or ESC to quit. Speeds up as the snake grows.
 */

import type { GameTerminal } from '../utils';
import { createSnakeGame, type SnakeGameOptions } from './loop';
import { TerminalRenderSink } from './terminalSink';
import type { GameResult } from './types';

/**
 * Snake Game Controller
 */
export interface SnakeController {
  stop: () => void;
  readonly isRunning: boolean;
  /** Settles with the final score once the game has ended */
  finished: Promise<GameResult>;
}

/**
 * Start a game on `terminal`. The caller owns the screen buffer: the game
 * only draws cells and, at the end, the score summary.
 */
export function runSnakeGame(terminal: GameTerminal, options: SnakeGameOptions = {}): SnakeController {
  const sink = new TerminalRenderSink(terminal);
  const game = createSnakeGame(sink, options);
  let running = true;

  const keyListener = terminal.onKey(({ domEvent }) => {
    if (!running) return;
    game.input.onKey(domEvent.key);
  });

  const finished = game.run().finally(() => {
    running = false;
    keyListener.dispose();
  });

  return {
    stop: () => {
      if (!running) return;
      game.stop().catch(err => {
        console.error('[Snake] Failed to stop game:', err);
      });
    },
    get isRunning() {
      return running;
    },
    finished,
  };
}

export { createSnakeGame, GameLoop, PAUSE_POLL_MS, type SnakeGame, type SnakeGameOptions, type GameLoopOptions } from './loop';
export { InputChannel, KEY_MAP, tokenForKey } from './input';
export { GameState, type GameStateInit } from './state';
export { CellGrid, writeAt, type CellUpdate, type RenderEvent, type RenderSink } from './render';
export { TerminalRenderSink } from './terminalSink';
export { nextHead, isSelfCollision, ateFood, nextFood, tickIntervalMs, type RandomSource } from './collision';
export * from './types';
