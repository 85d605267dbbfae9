/**
 * @tickboard/dashboard
 *
 * The dashboard application: state machine, keybindings, screen, and the
 * wiring that runs them against any key source and frame sink.
 */

export { type DashboardRunOptions, type DashboardRunResult, runDashboard } from "./app.js";
export { type DashboardConfig, resolveDashboardConfig } from "./config.js";
export { type TerminalRunOptions, runInTerminal } from "./terminal.js";
export { resolveDashboardCommand } from "./helpers/keybindings.js";
export {
  createInitialState,
  isExited,
  reduceDashboardState,
  toggleGaugeColor,
} from "./helpers/state.js";
export { progressLabel, renderDashboard } from "./screens/dashboard-screen.js";
export {
  EXIT_NOTICE,
  PANEL_TITLE,
  TITLE,
  colors,
  gaugeColorValue,
  keyHintStyle,
  noticeStyle,
} from "./theme.js";
export type { DashboardCommand, DashboardState, GaugeColor } from "./types.js";
