import type { Viewport } from "@tickboard/core";

type EnvMap = Readonly<Record<string, string | undefined>>;

export const FALLBACK_VIEWPORT: Viewport = Object.freeze({ cols: 80, rows: 24 });

function readPositiveInt(value: unknown): number | undefined {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) return undefined;
  return Math.trunc(value);
}

function parseEnvInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  return readPositiveInt(Number.parseInt(value, 10));
}

/** Stream size first, then COLUMNS/LINES, then 80x24. */
export function readViewport(
  stream: Readonly<{ columns?: number; rows?: number }>,
  env: EnvMap,
): Viewport {
  const cols =
    readPositiveInt(stream.columns) ?? parseEnvInt(env["COLUMNS"]) ?? FALLBACK_VIEWPORT.cols;
  const rows = readPositiveInt(stream.rows) ?? parseEnvInt(env["LINES"]) ?? FALLBACK_VIEWPORT.rows;
  return { cols, rows };
}
