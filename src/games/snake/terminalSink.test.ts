import { describe, it, expect, expectTypeOf } from 'vitest';
import type { Terminal } from '@xterm/xterm';
import { themes } from '../../themes';
import type { Disposable, GameTerminal, TerminalKeyEvent } from '../utils';
import type { RenderEvent } from './render';
import { TerminalRenderSink } from './terminalSink';
import { END_CREDIT } from './types';

class FakeTerminal implements GameTerminal {
  writes: string[] = [];

  write(data: string): void {
    this.writes.push(data);
  }

  onKey(_listener: (event: TerminalKeyEvent) => void): Disposable {
    return { dispose: () => {} };
  }
}

describe('TerminalRenderSink', () => {
  it('accepts an xterm.js Terminal', () => {
    expectTypeOf<Terminal>().toMatchTypeOf<GameTerminal>();
  });

  it('buffers cell updates into one write per notification', () => {
    const terminal = new FakeTerminal();
    const sink = new TerminalRenderSink(terminal, themes.cyan);

    sink.applyCellUpdate(4, 10, '#');
    sink.applyCellUpdate(10, 20, '*');
    sink.applyCellUpdate(4, 8, ' ');
    sink.applyCellUpdate(0, 2, 'Score : 0 ');
    expect(terminal.writes).toEqual([]);

    sink.notify('update-screen');
    expect(terminal.writes).toEqual([
      '\x1b[5;11H\x1b[96m#\x1b[0m'
        + '\x1b[11;21H\x1b[95m*\x1b[0m'
        + '\x1b[5;9H \x1b[0m'
        + '\x1b[1;3H\x1b[2;96mScore : 0 \x1b[0m',
    ]);
  });

  it('skips the write when nothing changed', () => {
    const terminal = new FakeTerminal();
    const sink = new TerminalRenderSink(terminal, themes.cyan);
    sink.notify('update-screen');
    expect(terminal.writes).toEqual([]);
  });

  it('uses the colors of the theme it was given', () => {
    const terminal = new FakeTerminal();
    const sink = new TerminalRenderSink(terminal, themes.amber);
    sink.applyCellUpdate(1, 1, '*');
    sink.notify('update-screen');
    expect(terminal.writes).toEqual(['\x1b[2;2H\x1b[91m*\x1b[0m']);
  });

  it('clears the screen and draws only the summary', () => {
    const terminal = new FakeTerminal();
    const sink = new TerminalRenderSink(terminal, themes.cyan);

    sink.applyCellUpdate(4, 10, '#');
    sink.showSummary(['Score - 3', END_CREDIT]);
    sink.notify('end-game');

    expect(terminal.writes).toEqual([
      '\x1b[2J\x1b[H'
        + '\x1b[1;1H\x1b[96mScore - 3\x1b[0m'
        + '\x1b[2;1H\x1b[96mhttp://bitemelater.in\x1b[0m',
    ]);
    expect(sink.surface.visibleLines()).toEqual(['Score - 3', END_CREDIT]);
  });

  it('mirrors cells and events on its surface', () => {
    const sink = new TerminalRenderSink(new FakeTerminal(), themes.cyan);
    const events: RenderEvent[] = [];
    sink.surface.onNotify(event => events.push(event));

    sink.applyCellUpdate(4, 10, '#');
    sink.notify('update-screen');

    expect(sink.surface.cellAt(4, 10)).toBe('#');
    expect(events).toEqual(['update-screen']);
  });
});
