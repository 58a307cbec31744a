/**
 * RenderSink that draws on a terminal with cursor-addressed ANSI writes.
 *
 * Cell updates are buffered and flushed as one write per notification so
 * the terminal paints a whole tick at once. A CellGrid mirror keeps the
 * logical screen for hosts that want to read it back.
 */

import { ANSI_RESET, getThemeColors, type ThemeColors } from '../../themes';
import { cursorTo, type GameTerminal } from '../utils';
import { CellGrid, type RenderEvent, type RenderSink } from './render';
import { GLYPHS, STATUS_ROW } from './types';

export class TerminalRenderSink implements RenderSink {
  private readonly grid = new CellGrid();
  private pending = '';

  constructor(
    private readonly terminal: GameTerminal,
    private readonly colors: ThemeColors = getThemeColors(),
  ) {}

  /** Logical screen contents */
  get surface(): CellGrid {
    return this.grid;
  }

  applyCellUpdate(row: number, col: number, text: string): void {
    this.grid.applyCellUpdate(row, col, text);
    this.pending += `${cursorTo(row, col)}${this.colorFor(row, text)}${text}${ANSI_RESET}`;
  }

  showSummary(lines: readonly string[]): void {
    this.grid.showSummary(lines);
    this.pending = '\x1b[2J\x1b[H';
    lines.forEach((line, i) => {
      this.pending += `${cursorTo(i, 0)}${this.colors.primary}${line}${ANSI_RESET}`;
    });
  }

  notify(event: RenderEvent): void {
    this.flush();
    this.grid.notify(event);
  }

  private flush(): void {
    if (!this.pending) return;
    const output = this.pending;
    this.pending = '';
    this.terminal.write(output);
  }

  private colorFor(row: number, text: string): string {
    if (row === STATUS_ROW) return this.colors.dim;
    if (text === GLYPHS.food) return this.colors.accent;
    if (text === GLYPHS.empty) return '';
    return this.colors.primary;
  }
}
