/**
 * Render contract the game loop talks to, plus an in-memory character grid
 * that implements it.
 */

import { BOARD_HEIGHT, BOARD_WIDTH } from './types';

export type RenderEvent = 'update-screen' | 'end-game';

export interface CellUpdate {
  row: number;
  col: number;
  text: string;
}

/**
 * Surface the loop draws on. Implemented by the host; the loop never holds
 * its lock while calling into it.
 */
export interface RenderSink {
  /** Overwrite `text.length` characters starting at (row, col) */
  applyCellUpdate(row: number, col: number, text: string): void;
  /** Clear the surface and show only `lines` */
  showSummary(lines: readonly string[]): void;
  notify(event: RenderEvent): void;
}

/**
 * Splice `text` into `line` at `col`, padding with spaces when the line is
 * shorter than `col`. Writes past the end extend the line.
 */
export function writeAt(line: string, col: number, text: string): string {
  const padded = line.length < col ? line + ' '.repeat(col - line.length) : line;
  return padded.slice(0, col) + text + padded.slice(col + text.length);
}

/**
 * H × W character grid. Rows start as W spaces.
 */
export class CellGrid implements RenderSink {
  private rows: string[];
  private listeners: Array<(event: RenderEvent) => void> = [];

  constructor(
    readonly height: number = BOARD_HEIGHT,
    readonly width: number = BOARD_WIDTH,
  ) {
    this.rows = CellGrid.blankRows(height, width);
  }

  private static blankRows(height: number, width: number): string[] {
    return Array.from({ length: height }, () => ' '.repeat(width));
  }

  applyCellUpdate(row: number, col: number, text: string): void {
    if (row < 0 || row >= this.rows.length || col < 0) {
      console.warn(`[Snake] Ignoring cell update outside grid: (${row}, ${col})`);
      return;
    }
    this.rows[row] = writeAt(this.rows[row], col, text);
  }

  showSummary(lines: readonly string[]): void {
    this.rows = [...lines];
  }

  notify(event: RenderEvent): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  /** Subscribe to notifications; returns an unsubscribe function */
  onNotify(listener: (event: RenderEvent) => void): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx !== -1) this.listeners.splice(idx, 1);
    };
  }

  /** Character at (row, col), or a space past the end of the row */
  cellAt(row: number, col: number): string {
    return this.rows[row]?.[col] ?? ' ';
  }

  lines(): string[] {
    return [...this.rows];
  }

  /** Visible content: rows with trailing blanks stripped, trailing empty rows dropped */
  visibleLines(): string[] {
    const trimmed = this.rows.map(r => r.trimEnd());
    while (trimmed.length > 0 && trimmed[trimmed.length - 1] === '') {
      trimmed.pop();
    }
    return trimmed;
  }

  reset(): void {
    this.rows = CellGrid.blankRows(this.height, this.width);
  }

  toString(): string {
    return this.rows.join('\n');
  }
}
