import {
  DEFAULT_PROGRESS_MAX,
  DEFAULT_PROGRESS_STEP,
  DEFAULT_TICK_INTERVAL_MS,
} from "@tickboard/core";
import { resolveTraceFile } from "@tickboard/node";

type EnvMap = Readonly<Record<string, string | undefined>>;

export type DashboardConfig = Readonly<{
  ticker: Readonly<{ intervalMs: number; step: number; max: number }>;
  /** Trace destination from TICKBOARD_TRACE_FILE, or null when tracing is off. */
  traceFile: string | null;
}>;

export function resolveDashboardConfig(env: EnvMap): DashboardConfig {
  return Object.freeze({
    ticker: Object.freeze({
      intervalMs: DEFAULT_TICK_INTERVAL_MS,
      step: DEFAULT_PROGRESS_STEP,
      max: DEFAULT_PROGRESS_MAX,
    }),
    traceFile: resolveTraceFile(env),
  });
}
