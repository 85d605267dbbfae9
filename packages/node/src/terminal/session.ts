/**
 * packages/node/src/terminal/session.ts: Scoped ownership of the terminal.
 *
 * Opening a session switches stdin to raw mode, enters the alternate screen
 * and hides the cursor. `restore()` undoes all of it and is safe to call from
 * any exit path, any number of times.
 */

import type { Readable, Writable } from "node:stream";
import { TickboardError, describeError } from "@tickboard/core";
import {
  CLEAR_SCREEN,
  CURSOR_HOME,
  ENTER_ALT_SCREEN,
  HIDE_CURSOR,
  LEAVE_ALT_SCREEN,
  SGR_RESET,
  SHOW_CURSOR,
} from "../output/ansi.js";

export type TtyInput = Readable & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type TtyOutput = Writable & {
  isTTY?: boolean;
  columns?: number;
  rows?: number;
  getColorDepth?: () => number;
};

export type TerminalSessionOptions = Readonly<{
  stdin: TtyInput;
  stdout: TtyOutput;
  /** Use the alternate screen buffer. Defaults to true. */
  alternateScreen?: boolean;
  trace?: (message: string) => void;
}>;

export interface TerminalSession {
  readonly stdin: TtyInput;
  readonly stdout: TtyOutput;
  readonly active: boolean;
  /** Leave raw mode and the alternate screen. Idempotent. */
  restore(): void;
}

export function openTerminalSession(opts: TerminalSessionOptions): TerminalSession {
  const { stdin, stdout } = opts;
  const useAltScreen = opts.alternateScreen ?? true;
  const wasRaw = stdin.isRaw === true;
  const canSetRaw = stdin.isTTY === true && typeof stdin.setRawMode === "function";
  let active = true;

  try {
    if (canSetRaw && !wasRaw) stdin.setRawMode?.(true);
    stdin.setEncoding("utf8");
    stdin.resume();
    stdout.write(
      `${useAltScreen ? ENTER_ALT_SCREEN : ""}${HIDE_CURSOR}${SGR_RESET}${CLEAR_SCREEN}${CURSOR_HOME}`,
    );
  } catch (error) {
    if (canSetRaw && !wasRaw) stdin.setRawMode?.(false);
    throw new TickboardError(
      "TICKBOARD_TERMINAL_ERROR",
      `could not take over the terminal: ${describeError(error)}`,
      { cause: error },
    );
  }
  opts.trace?.(`session: opened raw=${String(canSetRaw)} altScreen=${String(useAltScreen)}`);

  return {
    stdin,
    stdout,
    get active() {
      return active;
    },
    restore(): void {
      if (!active) return;
      active = false;
      stdout.write(`${SGR_RESET}${SHOW_CURSOR}${useAltScreen ? LEAVE_ALT_SCREEN : ""}`);
      if (canSetRaw && !wasRaw) stdin.setRawMode?.(false);
      stdin.pause();
      opts.trace?.("session: restored");
    },
  };
}

/**
 * Run `body` with the terminal taken over, restoring it whether `body`
 * resolves or throws.
 */
export async function withTerminalSession<T>(
  opts: TerminalSessionOptions,
  body: (session: TerminalSession) => Promise<T>,
): Promise<T> {
  const session = openTerminalSession(opts);
  try {
    return await body(session);
  } finally {
    session.restore();
  }
}
