/**
 * CLI entry point for grid-snake
 *
 * Runs the game on the Node terminal adapter and offers a rematch with
 * clack prompts once a game ends.
 */

import * as p from '@clack/prompts';
import { runSnakeGame, KEY_MAP, END_CREDIT, formatFinalScore, type GameResult } from './games/snake';
import { enterAlternateBuffer, exitAlternateBuffer } from './games/utils';
import { sleep } from './games/shared/sleep';
import { helpText, parseCliArgs } from './options';
import { setTheme } from './themes';
import { createNodeTerminal } from './terminal';

/** Keep the end screen up briefly before leaving the alternate buffer */
const END_SCREEN_MS = 1200;

// ---------------------------------------------------------------------------
// Game lifecycle
// ---------------------------------------------------------------------------

async function playOnce(): Promise<GameResult> {
  const terminal = createNodeTerminal();
  enterAlternateBuffer(terminal, 'game start');

  const controller = runSnakeGame(terminal);
  const stopOnSignal = () => controller.stop();
  process.once('SIGTERM', stopOnSignal);

  try {
    const result = await controller.finished;
    await sleep(END_SCREEN_MS);
    return result;
  } finally {
    process.off('SIGTERM', stopOnSignal);
    exitAlternateBuffer(terminal, 'game over');
    terminal.dispose();
  }
}

function describeEnd(result: GameResult): string {
  const how = result.reason === 'collision' ? 'ran into itself' : 'quit';
  return `${formatFinalScore(result.score)}  (${how} after ${result.ticks} moves)`;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    process.exit(1);
  }
  const { options } = parsed;

  if (options.help) {
    console.log(helpText());
    return;
  }

  if (options.keys) {
    for (const [key, token] of Object.entries(KEY_MAP)) {
      console.log(`  ${JSON.stringify(key).padEnd(14)} ${token}`);
    }
    return;
  }

  setTheme(options.theme);
  p.intro('grid-snake');

  for (;;) {
    const result = await playOnce();
    p.log.info(describeEnd(result));
    p.log.message(END_CREDIT);

    const again = await p.confirm({ message: 'Play again?' });
    if (p.isCancel(again) || !again) break;
  }

  p.outro('Thanks for playing');
}

main().catch(err => {
  console.error('[Snake] Game failed:', err);
  process.exit(1);
});
