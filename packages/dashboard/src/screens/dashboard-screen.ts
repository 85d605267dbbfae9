import {
  type CellGrid,
  EMPTY_RECT,
  type StyledSegment,
  drawBlock,
  drawGauge,
  drawSegments,
  splitVertical,
  takeRows,
} from "@tickboard/core";
import { PANEL_TITLE, TITLE, gaugeColorValue, keyHintStyle } from "../theme.js";
import type { DashboardState } from "../types.js";

const PANEL_ROWS = 3;

const KEY_HINTS: readonly StyledSegment[] = Object.freeze([
  { text: "Change color" },
  { text: "<C>", style: keyHintStyle },
  { text: " Quit " },
  { text: "<q>", style: keyHintStyle },
]);

export function progressLabel(progress: number): string {
  return `Process 1: ${Math.round(progress * 100)}%`;
}

/**
 * Paint the whole dashboard: the title in the top fifth, and the gauge panel
 * at the top of the rest.
 */
export function renderDashboard(grid: CellGrid, state: DashboardState): void {
  grid.clear();
  const [titleArea = EMPTY_RECT, gaugeArea = EMPTY_RECT] = splitVertical(grid.bounds, [20, 80]);

  drawSegments(grid, takeRows(titleArea, 1), [{ text: TITLE }]);

  const inner = drawBlock(grid, takeRows(gaugeArea, PANEL_ROWS), {
    border: "thick",
    title: PANEL_TITLE,
    bottomTitle: KEY_HINTS,
  });
  drawGauge(grid, inner, {
    ratio: state.progress,
    label: progressLabel(state.progress),
    gaugeStyle: { fg: gaugeColorValue(state.gaugeColor) },
  });
}
