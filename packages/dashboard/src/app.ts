/**
 * Wires the dashboard: one channel, the input and ticker producers feeding it,
 * and the event loop that owns the state and paints every frame.
 */

import {
  type AppEvent,
  CellGrid,
  type EventLoopResult,
  type InputProducerResult,
  type RawKeyEvent,
  type Sleep,
  type TickerProducerResult,
  type Viewport,
  createChannel,
  runEventLoop,
  runInputProducer,
  runTickerProducer,
} from "@tickboard/core";
import type { DashboardConfig } from "./config.js";
import { createInitialState, isExited, reduceDashboardState } from "./helpers/state.js";
import { renderDashboard } from "./screens/dashboard-screen.js";
import type { DashboardState } from "./types.js";

export type DashboardRunOptions = Readonly<{
  keys: AsyncIterable<RawKeyEvent>;
  /** Present one painted frame. */
  present: (grid: CellGrid) => void | Promise<void>;
  /** Fixed size, or read before every frame so the grid follows resizes. */
  viewport: Viewport | (() => Viewport);
  ticker: DashboardConfig["ticker"];
  /** Overrides the ticker's timer. */
  sleep?: Sleep;
  /**
   * Stops the ticker; the input producer returns at its next key, so `keys`
   * should end on the same signal.
   */
  signal?: AbortSignal;
  trace?: (message: string) => void;
}>;

export type DashboardRunResult = EventLoopResult<DashboardState> &
  Readonly<{
    /** Settles once both producers have returned; not awaited by the run itself. */
    producers: Promise<readonly [InputProducerResult, TickerProducerResult]>;
  }>;

const noTrace = (_message: string): void => {};

/**
 * Run the dashboard until the quit key. The receiver is closed and the
 * producers are told to stop on every exit path.
 */
export async function runDashboard(opts: DashboardRunOptions): Promise<DashboardRunResult> {
  const trace = opts.trace ?? noTrace;
  const controller = new AbortController();
  const stop = (): void => controller.abort();
  if (opts.signal?.aborted === true) stop();
  else opts.signal?.addEventListener("abort", stop, { once: true });

  const { sender, receiver } = createChannel<AppEvent>();
  const input = runInputProducer(sender.clone(), opts.keys, {
    signal: controller.signal,
    trace,
  });
  const ticker = runTickerProducer(sender, {
    ...opts.ticker,
    ...(opts.sleep !== undefined ? { sleep: opts.sleep } : {}),
    signal: controller.signal,
    trace,
  });
  const producers = Promise.all([input, ticker] as const);

  const viewport = opts.viewport;
  const readSize = typeof viewport === "function" ? viewport : () => viewport;
  let grid: CellGrid | null = null;
  const gridFor = (size: Viewport): CellGrid => {
    if (grid !== null && grid.cols === size.cols && grid.rows === size.rows) return grid;
    const next = new CellGrid(size);
    trace(`dashboard: viewport ${next.cols}x${next.rows}`);
    grid = next;
    return next;
  };

  try {
    const result = await runEventLoop({
      receiver,
      initialState: createInitialState(),
      update: reduceDashboardState,
      isExited,
      draw: (state) => {
        const frame = gridFor(readSize());
        renderDashboard(frame, state);
        return opts.present(frame);
      },
      trace,
    });
    trace(
      `dashboard: final state exit=${String(result.state.exit)} color=${result.state.gaugeColor} progress=${result.state.progress}`,
    );
    return { ...result, producers };
  } finally {
    receiver.close();
    stop();
    opts.signal?.removeEventListener("abort", stop);
  }
}
