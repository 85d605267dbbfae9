/**
 * File-backed trace log. Stdout is owned by the full-screen display, so
 * diagnostics are appended to the file named by TICKBOARD_TRACE_FILE.
 */

import { appendFileSync } from "node:fs";

type EnvMap = Readonly<Record<string, string | undefined>>;

export const TRACE_FILE_ENV = "TICKBOARD_TRACE_FILE";

export interface TraceLog {
  readonly enabled: boolean;
  readonly file: string | null;
  trace(message: string): void;
  /** First append failure; tracing turns itself off after it. */
  readonly failure: unknown;
}

export type TraceLogOptions = Readonly<{
  file?: string | null;
  now?: () => Date;
}>;

export function resolveTraceFile(env: EnvMap): string | null {
  const value = env[TRACE_FILE_ENV]?.trim();
  return value !== undefined && value.length > 0 ? value : null;
}

export function createTraceLog(opts: TraceLogOptions = {}): TraceLog {
  const file = opts.file ?? null;
  const now = opts.now ?? (() => new Date());
  let enabled = file !== null;
  let failure: unknown = undefined;

  return {
    get enabled() {
      return enabled;
    },
    file,
    trace(message: string): void {
      if (!enabled || file === null) return;
      try {
        appendFileSync(file, `[tickboard ${now().toISOString()}] ${message}\n`);
      } catch (error) {
        enabled = false;
        failure = error;
      }
    },
    get failure() {
      return failure;
    },
  };
}
