/**
 * Paint routines for the handful of widgets the dashboard needs: styled text
 * runs, bordered blocks with titles, and a horizontal gauge.
 */

import { type CellGrid, measureText } from "./grid.js";
import { type Rect, innerRect, isVisibleRect } from "./layout.js";
import { type TextStyle, mergeTextStyle } from "./style.js";

export type StyledSegment = Readonly<{ text: string; style?: TextStyle }>;

export type Align = "left" | "center";

export type BorderStyle = "single" | "rounded" | "thick";

type BorderGlyphs = Readonly<{
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}>;

const BORDER_GLYPHS: Readonly<Record<BorderStyle, BorderGlyphs>> = Object.freeze({
  single: {
    topLeft: "┌",
    topRight: "┐",
    bottomLeft: "└",
    bottomRight: "┘",
    horizontal: "─",
    vertical: "│",
  },
  rounded: {
    topLeft: "╭",
    topRight: "╮",
    bottomLeft: "╰",
    bottomRight: "╯",
    horizontal: "─",
    vertical: "│",
  },
  thick: {
    topLeft: "┏",
    topRight: "┓",
    bottomLeft: "┗",
    bottomRight: "┛",
    horizontal: "━",
    vertical: "┃",
  },
});

function segmentsWidth(segments: readonly StyledSegment[]): number {
  let width = 0;
  for (const segment of segments) width += measureText(segment.text);
  return width;
}

function toSegments(value: string | readonly StyledSegment[]): readonly StyledSegment[] {
  return typeof value === "string" ? [{ text: value }] : value;
}

/**
 * Draw `segments` on the first row of `area`, clipped to its width.
 * Centered runs that overflow start at the left edge.
 */
export function drawSegments(
  grid: CellGrid,
  area: Rect,
  segments: readonly StyledSegment[],
  align: Align = "left",
  baseStyle?: TextStyle,
): void {
  if (!isVisibleRect(area)) return;
  const total = segmentsWidth(segments);
  const offset = align === "center" ? Math.max(0, Math.floor((area.w - total) / 2)) : 0;
  let x = area.x + offset;
  let room = area.w - offset;
  for (const segment of segments) {
    if (room <= 0) break;
    const written = grid.drawText(
      x,
      area.y,
      segment.text,
      mergeTextStyle(baseStyle, segment.style),
      room,
    );
    x += written;
    room -= written;
  }
}

export type BlockOptions = Readonly<{
  border?: BorderStyle;
  title?: string | readonly StyledSegment[];
  bottomTitle?: string | readonly StyledSegment[];
  bottomTitleAlign?: Align;
  style?: TextStyle;
}>;

/** Draw a bordered block and return the rect inside the border. */
export function drawBlock(grid: CellGrid, area: Rect, opts: BlockOptions = {}): Rect {
  const inner = innerRect(area);
  if (area.w < 2 || area.h < 2) return inner;

  const glyphs = BORDER_GLYPHS[opts.border ?? "single"];
  const style = opts.style;
  const right = area.x + area.w - 1;
  const bottom = area.y + area.h - 1;

  for (let x = area.x + 1; x < right; x++) {
    grid.setCell(x, area.y, glyphs.horizontal, style);
    grid.setCell(x, bottom, glyphs.horizontal, style);
  }
  for (let y = area.y + 1; y < bottom; y++) {
    grid.setCell(area.x, y, glyphs.vertical, style);
    grid.setCell(right, y, glyphs.vertical, style);
  }
  grid.setCell(area.x, area.y, glyphs.topLeft, style);
  grid.setCell(right, area.y, glyphs.topRight, style);
  grid.setCell(area.x, bottom, glyphs.bottomLeft, style);
  grid.setCell(right, bottom, glyphs.bottomRight, style);

  const titleRow: Rect = { x: area.x + 1, y: area.y, w: area.w - 2, h: 1 };
  if (opts.title !== undefined) {
    drawSegments(grid, titleRow, toSegments(opts.title), "left", style);
  }
  if (opts.bottomTitle !== undefined) {
    drawSegments(
      grid,
      { ...titleRow, y: bottom },
      toSegments(opts.bottomTitle),
      opts.bottomTitleAlign ?? "center",
      style,
    );
  }
  return inner;
}

export type GaugeOptions = Readonly<{
  /** Fill fraction; clamped to [0, 1], non-finite values count as 0. */
  ratio: number;
  label?: string;
  /** Style of the filled part. Its foreground is the gauge color. */
  gaugeStyle?: TextStyle;
  style?: TextStyle;
}>;

export function clamp01(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

/**
 * Fill `floor(w * ratio)` columns of every row with full blocks and center
 * the label on the middle row. Label cells over the filled part are inverted
 * so they stay readable against the gauge color.
 */
export function drawGauge(grid: CellGrid, area: Rect, opts: GaugeOptions): void {
  if (!isVisibleRect(area)) return;
  const ratio = clamp01(opts.ratio);
  const filled = Math.min(area.w, Math.floor(area.w * ratio));
  const fillStyle = mergeTextStyle(opts.style, opts.gaugeStyle);

  for (let y = area.y; y < area.y + area.h; y++) {
    for (let x = area.x; x < area.x + area.w; x++) {
      if (x < area.x + filled) grid.setCell(x, y, "█", fillStyle);
      else grid.setCell(x, y, " ", opts.style);
    }
  }

  const label = opts.label ?? "";
  if (label.length === 0) return;
  const labelRow = area.y + Math.floor(area.h / 2);
  const labelWidth = Math.min(area.w, measureText(label));
  let x = area.x + Math.floor((area.w - labelWidth) / 2);
  const onFill = mergeTextStyle(fillStyle, { inverse: true });
  for (const char of label) {
    if (x >= area.x + area.w) break;
    grid.setCell(x, labelRow, char, x < area.x + filled ? onFill : opts.style);
    x++;
  }
}
