import assert from "node:assert/strict";
import test from "node:test";
import type { CellGrid, RawKeyEvent, Sleep } from "@tickboard/core";
import { runDashboard } from "../app.js";

const TICKER = { intervalMs: 100, step: 0.35, max: 1 } as const;

/** Resolves the first `ticks` sleeps at once, then waits for the abort. */
function sleepFor(ticks: number): Sleep {
  let calls = 0;
  return (_ms, signal) => {
    calls++;
    if (calls <= ticks) return Promise.resolve();
    return new Promise<void>((resolve) => {
      if (signal === undefined || signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener("abort", () => resolve(), { once: true });
    });
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve!: () => void;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

async function* typeAfter(
  gate: Promise<void>,
  keys: readonly string[],
): AsyncGenerator<RawKeyEvent, void, void> {
  await gate;
  for (const key of keys) yield { key, action: "down" };
}

test("progress, toggle and quit run end to end", async () => {
  const secondFrame = deferred();
  const frames: string[][] = [];
  const traces: string[] = [];

  const result = await runDashboard({
    keys: typeAfter(secondFrame.promise, ["c", "q"]),
    present: (grid: CellGrid) => {
      frames.push(grid.toLines());
      if (frames.length === 2) secondFrame.resolve();
    },
    viewport: { cols: 40, rows: 10 },
    ticker: TICKER,
    sleep: sleepFor(1),
    trace: (message) => traces.push(message),
  });

  assert.deepEqual(result.state, { exit: true, gaugeColor: "secondary", progress: 0.35 });
  assert.equal(result.events, 3);
  assert.equal(result.frames, 3);
  assert.equal(frames.length, 3);
  assert.equal(frames[0]?.[3], `┃${" ".repeat(12)}Process 1: 0%${" ".repeat(13)}┃`);
  assert.equal(frames[2]?.[3], `┃${"█".repeat(12)}Process 1: 35%${" ".repeat(12)}┃`);

  const [input, ticker] = await result.producers;
  assert.equal(input.forwarded, 2);
  assert.deepEqual(ticker, { reason: "aborted", ticks: 1, lastValue: 0.35 });
  assert.equal(traces.includes("loop: exited after 3 events, 3 frames"), true);
  assert.equal(traces.includes("dashboard: final state exit=true color=secondary progress=0.35"), true);
});

test("releases and unbound keys do not change the dashboard", async () => {
  async function* keys(): AsyncGenerator<RawKeyEvent, void, void> {
    yield { key: "q", action: "up" };
    yield { key: "x", action: "down" };
    yield { key: "q", action: "down" };
  }

  const result = await runDashboard({
    keys: keys(),
    present: () => {},
    viewport: { cols: 40, rows: 10 },
    ticker: TICKER,
    sleep: sleepFor(0),
  });

  assert.deepEqual(result.state, { exit: true, gaugeColor: "primary", progress: 0 });
  assert.equal(result.events, 2);
});

test("frames follow the viewport when the terminal is resized", async () => {
  const sizes = [
    { cols: 40, rows: 10 },
    { cols: 30, rows: 6 },
    { cols: 30, rows: 6 },
  ];
  let reads = 0;
  const grids: CellGrid[] = [];
  const shapes: string[] = [];
  const traces: string[] = [];

  async function* keys(): AsyncGenerator<RawKeyEvent, void, void> {
    yield { key: "x", action: "down" };
    yield { key: "c", action: "down" };
    yield { key: "q", action: "down" };
  }

  await runDashboard({
    keys: keys(),
    present: (grid) => {
      grids.push(grid);
      shapes.push(`${grid.cols}x${grid.rows}:${grid.toLines()[2] ?? ""}`);
    },
    viewport: () => sizes[Math.min(reads++, sizes.length - 1)] ?? { cols: 80, rows: 24 },
    ticker: TICKER,
    sleep: sleepFor(0),
    trace: (message) => traces.push(message),
  });

  assert.deepEqual(shapes, [
    `40x10:┏Background Processes${"━".repeat(18)}┓`,
    `30x6:┃${" ".repeat(7)}Process 1: 0%${" ".repeat(8)}┃`,
    `30x6:┃${" ".repeat(7)}Process 1: 0%${" ".repeat(8)}┃`,
  ]);
  assert.equal(grids[1], grids[2]);
  assert.deepEqual(
    traces.filter((message) => message.startsWith("dashboard: viewport")),
    ["dashboard: viewport 40x10", "dashboard: viewport 30x6"],
  );
});

test("a failing draw stops the dashboard with TICKBOARD_DRAW_FAILED", async () => {
  const failure = new Error("EPIPE");
  await assert.rejects(
    runDashboard({
      keys: typeAfter(new Promise<void>(() => {}), []),
      present: () => {
        throw failure;
      },
      viewport: { cols: 40, rows: 10 },
      ticker: TICKER,
      sleep: sleepFor(0),
    }),
    { code: "TICKBOARD_DRAW_FAILED", cause: failure },
  );
});

test("the run fails with TICKBOARD_CHANNEL_CLOSED once both producers stop", async () => {
  const controller = new AbortController();
  controller.abort();
  const frames: number[] = [];
  await assert.rejects(
    runDashboard({
      keys: typeAfter(Promise.resolve(), []),
      present: (grid) => {
        frames.push(grid.cols);
      },
      viewport: { cols: 40, rows: 10 },
      ticker: TICKER,
      signal: controller.signal,
    }),
    { code: "TICKBOARD_CHANNEL_CLOSED" },
  );
  assert.deepEqual(frames, [40]);
});
