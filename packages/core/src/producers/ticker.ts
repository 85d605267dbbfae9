import type { ChannelSender } from "../channel.js";
import { type AppEvent, progressUpdate } from "../events.js";

export const DEFAULT_TICK_INTERVAL_MS = 100;
export const DEFAULT_PROGRESS_STEP = 0.01;
export const DEFAULT_PROGRESS_MAX = 1;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type TickerOptions = Readonly<{
  intervalMs?: number;
  step?: number;
  max?: number;
  /** Timer used between ticks. Defaults to a setTimeout-backed sleep. */
  sleep?: Sleep;
  signal?: AbortSignal;
  trace?: (message: string) => void;
}>;

export type TickerProducerResult = Readonly<{
  reason: "receiver-closed" | "aborted";
  ticks: number;
  lastValue: number;
}>;

function normalizeIntervalMs(intervalMs: number | undefined): number {
  if (intervalMs === undefined || !Number.isFinite(intervalMs) || intervalMs <= 0) {
    return DEFAULT_TICK_INTERVAL_MS;
  }
  return Math.floor(intervalMs);
}

function normalizeStep(step: number | undefined): number {
  if (step === undefined || !Number.isFinite(step) || step <= 0) return DEFAULT_PROGRESS_STEP;
  return step;
}

function normalizeMax(max: number | undefined): number {
  if (max === undefined || !Number.isFinite(max) || max <= 0) return DEFAULT_PROGRESS_MAX;
  return max;
}

/** Progress reached after `ticks` steps: `min(ticks * step, max)`. */
export function progressAfterTicks(ticks: number, step: number, max: number): number {
  return Math.min(ticks * step, max);
}

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Create an endless progress ramp that yields at a fixed cadence.
 *
 * The tick count stops growing once the ramp is pinned at `max`, after which
 * every tick yields `max`. Ends only when `signal` aborts.
 */
export async function* createTickerStream(
  opts: TickerOptions = {},
): AsyncGenerator<number, void, void> {
  const intervalMs = normalizeIntervalMs(opts.intervalMs);
  const step = normalizeStep(opts.step);
  const max = normalizeMax(opts.max);
  const wait = opts.sleep ?? sleep;
  const signal = opts.signal;

  let ticks = 0;
  while (signal?.aborted !== true) {
    await wait(intervalMs, signal);
    if (opts.signal?.aborted === true) return;
    const value = progressAfterTicks(ticks + 1, step, max);
    if (value < max) ticks++;
    yield value;
  }
}

/**
 * Feed the progress ramp into the channel until the receiver goes away or
 * `signal` aborts. Always closes `sender` before returning.
 */
export async function runTickerProducer(
  sender: ChannelSender<AppEvent>,
  opts: TickerOptions = {},
): Promise<TickerProducerResult> {
  let ticks = 0;
  let lastValue = 0;
  try {
    for await (const value of createTickerStream(opts)) {
      if (!sender.send(progressUpdate(value))) {
        opts.trace?.(`ticker: receiver closed after ${ticks} ticks`);
        return { reason: "receiver-closed", ticks, lastValue };
      }
      ticks++;
      lastValue = value;
    }
    opts.trace?.(`ticker: aborted after ${ticks} ticks`);
    return { reason: "aborted", ticks, lastValue };
  } finally {
    sender.close();
  }
}
