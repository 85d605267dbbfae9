import type { DashboardCommand } from "../types.js";

const COMMAND_BY_KEY: Readonly<Record<string, DashboardCommand>> = Object.freeze({
  q: "quit",
  c: "toggle-color",
});

/** Keys match exactly: "Q" and "ctrl+c" are not bindings. */
export function resolveDashboardCommand(key: string): DashboardCommand | undefined {
  return Object.hasOwn(COMMAND_BY_KEY, key) ? COMMAND_BY_KEY[key] : undefined;
}
