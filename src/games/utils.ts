/**
 * Shared terminal utilities for games
 *
 * Games draw on a GameTerminal: the slice of the xterm.js Terminal API they
 * actually use. An xterm.js Terminal satisfies it as-is; the CLI provides a
 * Node stdin/stdout implementation.
 */

export interface Disposable {
  dispose: () => void;
}

export interface TerminalKeyEvent {
  key: string;
  domEvent: { key: string };
}

export interface GameTerminal {
  write(data: string): void;
  onKey(listener: (event: TerminalKeyEvent) => void): Disposable;
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * Prevents double-entry/exit when a game is restarted on the same terminal.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string }>();

/**
 * Enter alternate screen buffer, hide the cursor and clear the screen
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns false if the terminal was already in the buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason });
  return true;
}

/**
 * Leave the alternate screen buffer and show the cursor again
 *
 * @returns false if the terminal was not in the buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

/**
 * ANSI sequence that moves the cursor to a zero-based (row, col)
 */
export function cursorTo(row: number, col: number): string {
  return `\x1b[${row + 1};${col + 1}H`;
}
