/**
 * Node Terminal Adapter
 *
 * Maps process stdin/stdout to the GameTerminal interface so games written
 * against xterm.js run directly in any terminal emulator.
 */

import type { Disposable, GameTerminal, TerminalKeyEvent } from './games/utils';

export interface NodeTerminal extends GameTerminal {
  readonly cols: number;
  readonly rows: number;
  /** Restore cooked mode and stop reading stdin */
  dispose: () => void;
}

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
export function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  // Ctrl-C ends the game the same way ESC does
  if (data === '\x03') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches a whole tick into a single paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';
const SHOW_CURSOR_AND_RESET = '\x1b[?25h\x1b[0m';

export function createNodeTerminal(
  stdin: NodeJS.ReadStream = process.stdin,
  stdout: NodeJS.WriteStream = process.stdout,
): NodeTerminal {
  const keyListeners: ((event: TerminalKeyEvent) => void)[] = [];

  if (stdin.isTTY) {
    stdin.setRawMode(true);
  }
  stdin.resume();
  stdin.setEncoding('utf8');

  const onData = (data: string) => {
    const key = parseKey(data);
    const event: TerminalKeyEvent = { key, domEvent: { key } };
    for (const listener of [...keyListeners]) {
      listener(event);
    }
  };
  stdin.on('data', onData);

  let disposed = false;

  return {
    write: (data: string) => {
      stdout.write(SYNC_START + data + SYNC_END);
    },
    get cols() { return stdout.columns || 80; },
    get rows() { return stdout.rows || 24; },
    onKey: (callback: (event: TerminalKeyEvent) => void): Disposable => {
      keyListeners.push(callback);
      return {
        dispose: () => {
          const idx = keyListeners.indexOf(callback);
          if (idx !== -1) keyListeners.splice(idx, 1);
        },
      };
    },
    dispose: () => {
      if (disposed) return;
      disposed = true;
      stdin.off('data', onData);
      keyListeners.length = 0;
      if (stdin.isTTY) {
        stdin.setRawMode(false);
      }
      stdin.pause();
      stdout.write(SHOW_CURSOR_AND_RESET);
    },
  };
}
