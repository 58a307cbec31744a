/**
 * grid-snake
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run the game: runSnakeGame(terminal)
 * 3. Await controller.finished for the final score
 */

export {
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  cursorTo,
  type GameTerminal,
  type TerminalKeyEvent,
  type Disposable,
} from './utils';

export { Mutex, type Release } from './shared/mutex';
export { sleep, type Sleep } from './shared/sleep';

export * from './snake';
