/**
 * packages/core/src/screen/grid.ts: In-memory frame of styled cells.
 *
 * Widgets paint into a CellGrid; backends serialize it. Writes outside the
 * grid are clipped. Characters are stored per code point and every cell is
 * one column wide.
 */

import type { Rect } from "./layout.js";
import type { TextStyle } from "./style.js";

export type Cell = Readonly<{
  char: string;
  style: TextStyle | undefined;
}>;

export type Viewport = Readonly<{ cols: number; rows: number }>;

const BLANK_CELL: Cell = Object.freeze({ char: " ", style: undefined });

function sanitizeSize(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.floor(value);
}

export class CellGrid {
  readonly cols: number;
  readonly rows: number;
  private readonly cells: Cell[];

  constructor(viewport: Viewport) {
    this.cols = sanitizeSize(viewport.cols);
    this.rows = sanitizeSize(viewport.rows);
    this.cells = new Array<Cell>(this.cols * this.rows).fill(BLANK_CELL);
  }

  get bounds(): Rect {
    return { x: 0, y: 0, w: this.cols, h: this.rows };
  }

  contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.cols && y < this.rows;
  }

  cellAt(x: number, y: number): Cell | undefined {
    if (!this.contains(x, y)) return undefined;
    return this.cells[y * this.cols + x];
  }

  setCell(x: number, y: number, char: string, style?: TextStyle): void {
    if (!this.contains(x, y)) return;
    this.cells[y * this.cols + x] = { char, style };
  }

  /**
   * Write `text` starting at (x, y), one code point per cell.
   * Stops at `maxWidth` cells or the right edge. Returns the cells written.
   */
  drawText(x: number, y: number, text: string, style?: TextStyle, maxWidth?: number): number {
    const limit = maxWidth === undefined ? Number.POSITIVE_INFINITY : Math.max(0, maxWidth);
    let written = 0;
    for (const char of text) {
      if (written >= limit) break;
      const cx = x + written;
      if (cx >= this.cols) break;
      this.setCell(cx, y, char < " " ? " " : char, style);
      written++;
    }
    return written;
  }

  fill(area: Rect, char: string, style?: TextStyle): void {
    for (let row = area.y; row < area.y + area.h; row++) {
      for (let col = area.x; col < area.x + area.w; col++) {
        this.setCell(col, row, char, style);
      }
    }
  }

  clear(): void {
    this.cells.fill(BLANK_CELL);
  }

  /** Plain-text rows with trailing blanks trimmed. */
  toLines(): string[] {
    const lines: string[] = [];
    for (let row = 0; row < this.rows; row++) {
      let line = "";
      for (let col = 0; col < this.cols; col++) {
        line += this.cells[row * this.cols + col]?.char ?? " ";
      }
      lines.push(line.trimEnd());
    }
    return lines;
  }

  toText(): string {
    return this.toLines().join("\n");
  }
}

/** Number of terminal cells `text` occupies (one per code point). */
export function measureText(text: string): number {
  return Array.from(text).length;
}
