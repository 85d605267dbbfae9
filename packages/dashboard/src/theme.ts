import { type Rgb24, type TextStyle, rgb } from "@tickboard/core";
import type { GaugeColor } from "./types.js";

export const PRODUCT_NAME = "tickboard";
export const TITLE = "Process Overview";
export const PANEL_TITLE = "Background Processes";
export const EXIT_NOTICE = "Exiting application...";

export const colors = Object.freeze({
  green: rgb(0, 205, 0),
  yellow: rgb(205, 205, 0),
  blue: rgb(0, 0, 238),
  red: rgb(205, 0, 0),
});

const GAUGE_COLORS: Readonly<Record<GaugeColor, Rgb24>> = Object.freeze({
  primary: colors.green,
  secondary: colors.yellow,
});

export const keyHintStyle: TextStyle = Object.freeze({ fg: colors.blue, bold: true });
export const noticeStyle: TextStyle = Object.freeze({ fg: colors.red });

export function gaugeColorValue(color: GaugeColor): Rgb24 {
  return GAUGE_COLORS[color];
}
