/**
 * Input side of the game: key table and the single-slot token mailbox.
 *
 * The mailbox slot is the requested token inside GameState. Writers go
 * through the same lock the loop holds while it ticks, so a keypress is
 * either fully visible at the start of a tick or deferred to the next one.
 */

import type { Mutex } from '../shared/mutex';
import { sleep as defaultSleep, type Sleep } from '../shared/sleep';
import type { GameState } from './state';
import { isControlToken, type ControlToken } from './types';

/**
 * Fixed key table. Symbols follow DOM KeyboardEvent.key naming, which is
 * what both xterm.js and the Node terminal adapter deliver.
 */
export const KEY_MAP: Readonly<Record<string, ControlToken>> = {
  h: 'left',
  j: 'down',
  k: 'up',
  l: 'right',
  ArrowLeft: 'left',
  ArrowDown: 'down',
  ArrowUp: 'up',
  ArrowRight: 'right',
  ' ': 'pause',
  i: 'exit',
  Escape: 'exit',
};

export function tokenForKey(symbol: string): ControlToken | null {
  return Object.prototype.hasOwnProperty.call(KEY_MAP, symbol) ? KEY_MAP[symbol] : null;
}

export class InputChannel {
  private waiters = new Set<() => void>();
  private sends = 0;

  constructor(
    private readonly state: GameState,
    private readonly lock: Mutex,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  /** Total tokens accepted so far */
  get sent(): number {
    return this.sends;
  }

  /**
   * Overwrite the slot with `token`. No queueing: a burst of keys between
   * two ticks collapses to the last one.
   */
  async send(token: ControlToken): Promise<void> {
    if (!isControlToken(token)) return;
    await this.lock.runExclusive(() => {
      switch (token) {
        case 'pause':
          this.state.requestPause();
          break;
        case 'exit':
          this.state.requestExit();
          break;
        default:
          this.state.requestDirection(token);
      }
      this.sends++;
    });
    this.wake();
  }

  /**
   * Map a raw key symbol and forward it. Unknown symbols are ignored.
   *
   * @returns whether the symbol mapped to a token
   */
  onKey(symbol: string): boolean {
    const token = tokenForKey(symbol);
    if (!token) return false;
    this.send(token).catch(err => {
      console.error(`[Snake] Failed to deliver ${token}:`, err);
    });
    return true;
  }

  /**
   * Resolve on the next send or after `timeoutMs`, whichever comes first.
   * Used by the pause wait so it reacts immediately but never waits longer
   * than one poll interval. A wake by send cancels the pending timer.
   */
  waitForSend(timeoutMs: number): Promise<void> {
    return new Promise(resolve => {
      const timeout = new AbortController();
      let done = false;
      const finish = () => {
        if (done) return;
        done = true;
        this.waiters.delete(finish);
        timeout.abort();
        resolve();
      };
      this.waiters.add(finish);
      this.sleep(timeoutMs, timeout.signal).then(finish, finish);
    });
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }
}
