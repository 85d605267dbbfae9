#!/usr/bin/env node
import process, { env, exit, stderr, stdin, stdout } from "node:process";
import { describeError } from "@tickboard/core";
import { type TerminalSession, createTraceLog } from "@tickboard/node";
import { resolveDashboardConfig } from "./config.js";
import { runInTerminal } from "./terminal.js";
import { PRODUCT_NAME } from "./theme.js";

const SIGNAL_EXIT_CODES: Readonly<Partial<Record<NodeJS.Signals, number>>> = Object.freeze({
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
});

const config = resolveDashboardConfig(env);
const log = createTraceLog({ file: config.traceFile });
const trace = (message: string): void => log.trace(message);
const controller = new AbortController();

let session: TerminalSession | null = null;

function reportTraceFailure(): void {
  if (log.failure === undefined) return;
  stderr.write(`${PRODUCT_NAME}: tracing disabled: ${describeError(log.failure)}\n`);
}

function onSignal(signal: NodeJS.Signals): void {
  trace(`dashboard: received ${signal}`);
  session?.restore();
  controller.abort();
  reportTraceFailure();
  exit(SIGNAL_EXIT_CODES[signal] ?? 1);
}

for (const signal of ["SIGHUP", "SIGINT", "SIGTERM"] as const) {
  process.once(signal, onSignal);
}

let code = 0;
try {
  await runInTerminal({
    stdin,
    stdout,
    env,
    ticker: config.ticker,
    signal: controller.signal,
    onSession: (active) => {
      session = active;
    },
    trace,
  });
} catch (error) {
  trace(`dashboard: fatal: ${describeError(error)}`);
  stderr.write(`${describeError(error)}\n`);
  code = 1;
}
reportTraceFailure();
exit(code);
