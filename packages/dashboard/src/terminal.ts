/**
 * Runs the dashboard on a real (or fake) TTY pair: takes over the terminal,
 * feeds it stdin keys, writes frames at the current terminal size, and puts
 * the terminal back on every exit path.
 */

import {
  SGR_RESET,
  type TerminalSession,
  type TtyInput,
  type TtyOutput,
  createFrameWriter,
  detectColorSupport,
  readKeyEvents,
  readViewport,
  styleToSgr,
  withTerminalSession,
} from "@tickboard/node";
import { type DashboardRunResult, runDashboard } from "./app.js";
import type { DashboardConfig } from "./config.js";
import { EXIT_NOTICE, noticeStyle } from "./theme.js";

type EnvMap = Readonly<Record<string, string | undefined>>;

export type TerminalRunOptions = Readonly<{
  stdin: TtyInput;
  stdout: TtyOutput;
  env: EnvMap;
  ticker: DashboardConfig["ticker"];
  /** Aborting stops the producers and the key source. */
  signal?: AbortSignal;
  /** Called with the open session so signal handlers can restore it. */
  onSession?: (session: TerminalSession) => void;
  trace?: (message: string) => void;
}>;

const noTrace = (_message: string): void => {};

/**
 * Run until the quit key, then print the exit notice on the restored screen.
 * Failures reject after the terminal has been restored.
 */
export async function runInTerminal(opts: TerminalRunOptions): Promise<DashboardRunResult> {
  const { stdin, stdout, env } = opts;
  const trace = opts.trace ?? noTrace;
  const colorSupport = detectColorSupport(stdout, env);
  const controller = new AbortController();
  const stop = (): void => controller.abort();
  if (opts.signal?.aborted === true) stop();
  else opts.signal?.addEventListener("abort", stop, { once: true });
  trace(`dashboard: starting colorLevel=${colorSupport.level}`);

  try {
    const result = await withTerminalSession({ stdin, stdout, trace }, async (session) => {
      opts.onSession?.(session);
      const frames = createFrameWriter(stdout, { colorSupport, trace });
      try {
        return await runDashboard({
          keys: readKeyEvents(stdin, { signal: controller.signal }),
          present: (grid) => frames.draw(grid),
          viewport: () => readViewport(stdout, env),
          ticker: opts.ticker,
          signal: controller.signal,
          trace,
        });
      } finally {
        frames.dispose();
      }
    });
    trace(`dashboard: ${result.events} events, ${result.frames} frames`);
    stdout.write(`${styleToSgr(noticeStyle, colorSupport)}${EXIT_NOTICE}${SGR_RESET}\n`);
    return result;
  } finally {
    stop();
    opts.signal?.removeEventListener("abort", stop);
  }
}
