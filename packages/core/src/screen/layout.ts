export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

export const EMPTY_RECT: Rect = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });

export function rect(x: number, y: number, w: number, h: number): Rect {
  return { x, y, w: Math.max(0, Math.floor(w)), h: Math.max(0, Math.floor(h)) };
}

export function isVisibleRect(r: Rect): boolean {
  return r.w > 0 && r.h > 0;
}

/** Shrink by one cell on every side. */
export function innerRect(r: Rect): Rect {
  if (r.w < 2 || r.h < 2) return { x: r.x + 1, y: r.y + 1, w: 0, h: 0 };
  return { x: r.x + 1, y: r.y + 1, w: r.w - 2, h: r.h - 2 };
}

/** Keep the top `rows` rows of `r` (never taller than `r`). */
export function takeRows(r: Rect, rows: number): Rect {
  return { x: r.x, y: r.y, w: r.w, h: Math.max(0, Math.min(r.h, Math.floor(rows))) };
}

/**
 * Split `r` top to bottom by percentages of its height.
 *
 * Every region but the last gets `floor(h * pct / 100)` rows; the last region
 * takes whatever remains, so the regions always tile `r` exactly.
 */
export function splitVertical(r: Rect, percentages: readonly number[]): Rect[] {
  const out: Rect[] = [];
  let y = r.y;
  let remaining = r.h;
  for (let i = 0; i < percentages.length; i++) {
    const isLast = i === percentages.length - 1;
    const pct = percentages[i] ?? 0;
    const safePct = Number.isFinite(pct) ? Math.max(0, Math.min(100, pct)) : 0;
    const rows = isLast ? remaining : Math.min(remaining, Math.floor((r.h * safePct) / 100));
    out.push({ x: r.x, y, w: r.w, h: rows });
    y += rows;
    remaining -= rows;
  }
  return out;
}
