/**
 * packages/core/src/screen/style.ts: Cell styling types and color helpers.
 */

/** Packed RGB color (0x00RRGGBB). Value 0 is reserved as default/unset sentinel. */
export type Rgb24 = number;

export type TextStyle = Readonly<{
  fg?: Rgb24;
  bg?: Rgb24;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
  inverse?: boolean;
}>;

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. Note: `rgb(0, 0, 0)` encodes sentinel `0`. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}

export function rgbR(value: Rgb24): number {
  return (value >>> 16) & 0xff;
}

export function rgbG(value: Rgb24): number {
  return (value >>> 8) & 0xff;
}

export function rgbB(value: Rgb24): number {
  return value & 0xff;
}

/** Later fields win; undefined fields in `over` keep the base value. */
export function mergeTextStyle(base: TextStyle | undefined, over: TextStyle | undefined): TextStyle {
  if (base === undefined) return over ?? {};
  if (over === undefined) return base;
  return { ...base, ...over };
}

export function styleEquals(a: TextStyle | undefined, b: TextStyle | undefined): boolean {
  if (a === b) return true;
  const left = a ?? {};
  const right = b ?? {};
  return (
    left.fg === right.fg &&
    left.bg === right.bg &&
    (left.bold ?? false) === (right.bold ?? false) &&
    (left.dim ?? false) === (right.dim ?? false) &&
    (left.italic ?? false) === (right.italic ?? false) &&
    (left.underline ?? false) === (right.underline ?? false) &&
    (left.inverse ?? false) === (right.inverse ?? false)
  );
}
