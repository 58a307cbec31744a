/**
 * grid-snake
 *
 * Wraparound snake for xterm.js and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runSnakeGame, setTheme } from 'grid-snake';
 *   setTheme('amber');
 *   const controller = runSnakeGame(terminal);
 *   const { score } = await controller.finished;
 *
 * Headless usage:
 *   const grid = new CellGrid();
 *   const game = createSnakeGame(grid);
 *   const finished = game.run();
 *   game.input.onKey('j');
 *   setTimeout(() => game.input.onKey('i'), 2000);
 *   const { score, reason } = await finished;
 *
 * CLI usage:
 *   npx grid-snake
 */

export * from './games';

export {
  setTheme,
  getTheme,
  getThemeColors,
  getThemeNames,
  isValidThemeName,
  themes,
  ANSI_RESET,
  type ThemeName,
  type ThemeColors,
} from './themes';
