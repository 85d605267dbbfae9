import xtermHeadless from "@xterm/headless";

export type ScreenSnapshot = Readonly<{
  cols: number;
  rows: number;
  lines: readonly string[];
}>;

export type HeadlessScreen = Readonly<{
  write: (data: string) => Promise<void>;
  flush: () => Promise<void>;
  snapshot: () => ScreenSnapshot;
  /** Foreground of the cell as 0xRRGGBB, or null for the default color. */
  fgAt: (col: number, row: number) => number | null;
  isBoldAt: (col: number, row: number) => boolean;
  isAlternateBuffer: () => boolean;
  dispose: () => void;
}>;

/**
 * A headless xterm that interprets the escape sequences a backend writes, so
 * tests can assert what a real terminal would show.
 */
export function createScreen(opts: Readonly<{ cols: number; rows: number }>): HeadlessScreen {
  const { Terminal } = xtermHeadless;
  const { cols, rows } = opts;
  const term = new Terminal({
    cols,
    rows,
    allowProposedApi: true,
    convertEol: false,
    scrollback: 0,
  });

  let pending = Promise.resolve();
  const write = async (data: string): Promise<void> => {
    pending = pending.then(
      () =>
        new Promise<void>((resolve) => {
          term.write(data, resolve);
        }),
    );
    await pending;
  };

  const flush = async (): Promise<void> => {
    await pending;
  };

  const snapshot = (): ScreenSnapshot => {
    const lines: string[] = [];
    for (let r = 0; r < rows; r++) {
      const line = term.buffer.active.getLine(r);
      lines.push((line?.translateToString(true) ?? "").trimEnd());
    }
    return { cols, rows, lines };
  };

  const cellAt = (col: number, row: number) =>
    term.buffer.active.getLine(row)?.getCell(col);

  const fgAt = (col: number, row: number): number | null => {
    const cell = cellAt(col, row);
    if (!cell || cell.isFgDefault()) return null;
    return cell.getFgColor();
  };

  const isBoldAt = (col: number, row: number): boolean => {
    const cell = cellAt(col, row);
    return cell !== undefined && cell.isBold() !== 0;
  };

  return {
    write,
    flush,
    snapshot,
    fgAt,
    isBoldAt,
    isAlternateBuffer: () => term.buffer.active.type === "alternate",
    dispose: () => term.dispose(),
  };
}
