import type { AppEvent } from "@tickboard/core";
import type { DashboardState, GaugeColor } from "../types.js";
import { resolveDashboardCommand } from "./keybindings.js";

export function createInitialState(): DashboardState {
  return {
    exit: false,
    gaugeColor: "primary",
    progress: 0,
  };
}

export function toggleGaugeColor(color: GaugeColor): GaugeColor {
  return color === "primary" ? "secondary" : "primary";
}

export function isExited(state: DashboardState): boolean {
  return state.exit;
}

export function reduceDashboardState(state: DashboardState, event: AppEvent): DashboardState {
  if (state.exit) return state;
  if (event.kind === "progressUpdate") return { ...state, progress: event.value };

  const command = resolveDashboardCommand(event.key);
  if (command === "quit") return { ...state, exit: true };
  if (command === "toggle-color") {
    return { ...state, gaugeColor: toggleGaugeColor(state.gaugeColor) };
  }
  return state;
}
