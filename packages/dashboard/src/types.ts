export type GaugeColor = "primary" | "secondary";

export type DashboardState = Readonly<{
  /** Set by the quit key; the loop stops drawing once true. */
  exit: boolean;
  gaugeColor: GaugeColor;
  /** Last progress value received, in [0, 1]. */
  progress: number;
}>;

export type DashboardCommand = "quit" | "toggle-color";
