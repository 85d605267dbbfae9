/**
 * packages/node/src/output/ansi.ts: Cell grid to ANSI escape sequences.
 *
 * Frames are written in full: cursor home, one absolute cursor move per row,
 * and an SGR sequence whenever the style changes. Colors are downsampled to
 * the terminal's color level.
 */

import { type CellGrid, type Rgb24, type TextStyle, rgb, rgbB, rgbG, rgbR, styleEquals } from "@tickboard/core";

export type ColorLevel = 0 | 1 | 2 | 3;

export type ColorSupport = Readonly<{
  /** 0 none, 1 sixteen colors, 2 256 colors, 3 truecolor. */
  level: ColorLevel;
  noColor: boolean;
}>;

type EnvMap = Readonly<Record<string, string | undefined>>;

export const ESC = "\u001b";
export const SGR_RESET = `${ESC}[0m`;
export const CURSOR_HOME = `${ESC}[H`;
export const CLEAR_SCREEN = `${ESC}[2J`;
export const ENTER_ALT_SCREEN = `${ESC}[?1049h`;
export const LEAVE_ALT_SCREEN = `${ESC}[?1049l`;
export const HIDE_CURSOR = `${ESC}[?25l`;
export const SHOW_CURSOR = `${ESC}[?25h`;

/** xterm's default 16 colors, normal then bright. */
const ANSI16_PALETTE: readonly Rgb24[] = Object.freeze([
  0x000000, 0xcd0000, 0x00cd00, 0xcdcd00, 0x0000ee, 0xcd00cd, 0x00cdcd, 0xe5e5e5,
  0x7f7f7f, 0xff0000, 0x00ff00, 0xffff00, 0x5c5cff, 0xff00ff, 0x00ffff, 0xffffff,
]);

/** Channel intensities of the 6x6x6 cube in the 256-color palette. */
const CUBE_STEPS: readonly number[] = Object.freeze([0, 95, 135, 175, 215, 255]);
const GRAY_RAMP_START = 232;
const GRAY_RAMP_LENGTH = 24;

const FORCE_COLOR_WORDS: Readonly<Record<string, ColorLevel>> = Object.freeze({
  true: 1,
  false: 0,
});

function parseForceColor(value: string | undefined): ColorLevel | undefined {
  if (value === undefined || value === "") return undefined;
  if (Object.hasOwn(FORCE_COLOR_WORDS, value)) return FORCE_COLOR_WORDS[value];
  const level = Number.parseInt(value, 10);
  if (Number.isNaN(level)) return undefined;
  if (level <= 0) return 0;
  if (level === 1) return 1;
  return level === 2 ? 2 : 3;
}

function levelFromDepth(depth: number): ColorLevel {
  if (depth >= 24) return 3;
  if (depth >= 8) return 2;
  return depth >= 2 ? 1 : 0;
}

/**
 * NO_COLOR wins, then FORCE_COLOR, then the stream's reported depth.
 * Streams that report nothing get truecolor.
 */
export function detectColorSupport(
  stream: Readonly<{ getColorDepth?: () => number }>,
  env: EnvMap,
): ColorSupport {
  const noColor = env["NO_COLOR"];
  if (noColor !== undefined && noColor !== "") return { level: 0, noColor: true };

  const depth = stream.getColorDepth?.();
  const level =
    parseForceColor(env["FORCE_COLOR"]) ??
    (depth !== undefined && Number.isFinite(depth) ? levelFromDepth(depth) : 3);
  return { level, noColor: level === 0 };
}

function distanceSq(a: Rgb24, b: Rgb24): number {
  const dr = rgbR(a) - rgbR(b);
  const dg = rgbG(a) - rgbG(b);
  const db = rgbB(a) - rgbB(b);
  return dr * dr + dg * dg + db * db;
}

/** Index of the candidate closest to `target`; the first one wins ties. */
function nearestIndex<T>(
  target: T,
  candidates: readonly T[],
  distance: (a: T, b: T) => number,
): number {
  let best = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  candidates.forEach((candidate, index) => {
    const d = distance(target, candidate);
    if (d < bestDistance) {
      bestDistance = d;
      best = index;
    }
  });
  return best;
}

const channelDistance = (a: number, b: number): number => Math.abs(a - b);

export function toAnsi16Code(color: Rgb24, background: boolean): number {
  const index = nearestIndex(color, ANSI16_PALETTE, distanceSq);
  const base = index < 8 ? (background ? 40 : 30) : background ? 100 : 90;
  return base + (index % 8);
}

/** Nearest cube cell or gray-ramp step, whichever is closer to `color`. */
export function toAnsi256Code(color: Rgb24): number {
  const cubeIndex = (channel: number): number =>
    nearestIndex(channel, CUBE_STEPS, channelDistance);
  const r = cubeIndex(rgbR(color));
  const g = cubeIndex(rgbG(color));
  const b = cubeIndex(rgbB(color));
  const cube = rgb(CUBE_STEPS[r] ?? 0, CUBE_STEPS[g] ?? 0, CUBE_STEPS[b] ?? 0);

  const grays = Array.from({ length: GRAY_RAMP_LENGTH }, (_, i) => 8 + 10 * i);
  const luma = Math.round((rgbR(color) + rgbG(color) + rgbB(color)) / 3);
  const grayIndex = nearestIndex(luma, grays, channelDistance);
  const grayValue = grays[grayIndex] ?? 8;
  const gray = rgb(grayValue, grayValue, grayValue);

  const pick = nearestIndex(color, [cube, gray], distanceSq);
  if (pick === 1) return GRAY_RAMP_START + grayIndex;
  return 16 + 36 * r + 6 * g + b;
}

function colorCodes(color: Rgb24, background: boolean, level: ColorLevel): string {
  if (level >= 3) {
    return `;${background ? 48 : 38};2;${rgbR(color)};${rgbG(color)};${rgbB(color)}`;
  }
  if (level === 2) {
    return `;${background ? 48 : 38};5;${toAnsi256Code(color)}`;
  }
  return `;${toAnsi16Code(color, background)}`;
}

/**
 * SGR sequence for `style`. Always starts with a reset (0) so attributes from
 * the previous cell never bleed into the next.
 */
export function styleToSgr(style: TextStyle | undefined, support: ColorSupport): string {
  if (!style) return SGR_RESET;

  let sgr = `${ESC}[0`;
  if (style.bold) sgr += ";1";
  if (style.dim) sgr += ";2";
  if (style.italic) sgr += ";3";
  if (style.underline) sgr += ";4";
  if (style.inverse) sgr += ";7";
  if (support.level > 0) {
    if (style.fg !== undefined) sgr += colorCodes(style.fg, false, support.level);
    if (style.bg !== undefined) sgr += colorCodes(style.bg, true, support.level);
  }
  return `${sgr}m`;
}

/** Serialize the whole grid as one frame, ending with an SGR reset. */
export function serializeGrid(grid: CellGrid, support: ColorSupport): string {
  let out = `${SGR_RESET}${CURSOR_HOME}`;
  let current: TextStyle | undefined;
  for (let row = 0; row < grid.rows; row++) {
    out += `${ESC}[${row + 1};1H`;
    for (let col = 0; col < grid.cols; col++) {
      const cell = grid.cellAt(col, row);
      if (!cell) continue;
      if (!styleEquals(cell.style, current)) {
        out += styleToSgr(cell.style, support);
        current = cell.style;
      }
      out += cell.char;
    }
  }
  return `${out}${SGR_RESET}`;
}
