import assert from "node:assert/strict";
import test from "node:test";
import { CellGrid, rgb } from "@tickboard/core";
import { progressLabel, renderDashboard } from "../screens/dashboard-screen.js";
import type { DashboardState } from "../types.js";

const GREEN = rgb(0, 205, 0);
const YELLOW = rgb(205, 205, 0);

function paint(state: DashboardState, cols = 40, rows = 10): CellGrid {
  const grid = new CellGrid({ cols, rows });
  renderDashboard(grid, state);
  return grid;
}

test("dashboard paints the title, the panel and the key hints", () => {
  const grid = paint({ exit: false, gaugeColor: "primary", progress: 0.35 });
  assert.deepEqual(grid.toLines(), [
    "Process Overview",
    "",
    `┏Background Processes${"━".repeat(18)}┓`,
    `┃${"█".repeat(12)}Process 1: 35%${" ".repeat(12)}┃`,
    `┗${"━".repeat(7)}Change color<C> Quit <q>${"━".repeat(7)}┛`,
    "",
    "",
    "",
    "",
    "",
  ]);
});

test("gauge cells use the gauge color and the label is inverted over the fill", () => {
  const grid = paint({ exit: false, gaugeColor: "primary", progress: 0.35 });
  assert.deepEqual(grid.cellAt(1, 3), { char: "█", style: { fg: GREEN } });
  assert.deepEqual(grid.cellAt(13, 3), { char: "P", style: { fg: GREEN, inverse: true } });
  assert.deepEqual(grid.cellAt(14, 3), { char: "r", style: undefined });
});

test("toggled gauge is painted in the secondary color", () => {
  const grid = paint({ exit: false, gaugeColor: "secondary", progress: 0.35 });
  assert.deepEqual(grid.cellAt(1, 3)?.style, { fg: YELLOW });
});

test("key hints are bold blue", () => {
  const grid = paint({ exit: false, gaugeColor: "primary", progress: 0 });
  const hint = { fg: rgb(0, 0, 238), bold: true };
  assert.deepEqual(grid.cellAt(20, 4), { char: "<", style: hint });
  assert.deepEqual(grid.cellAt(21, 4), { char: "C", style: hint });
  assert.deepEqual(grid.cellAt(29, 4), { char: "<", style: hint });
  assert.deepEqual(grid.cellAt(30, 4), { char: "q", style: hint });
});

test("empty and full gauges", () => {
  const empty = paint({ exit: false, gaugeColor: "primary", progress: 0 });
  assert.equal(empty.toLines()[3], `┃${" ".repeat(12)}Process 1: 0%${" ".repeat(13)}┃`);

  const full = paint({ exit: false, gaugeColor: "primary", progress: 1 });
  assert.equal(full.toLines()[3], `┃${"█".repeat(11)}Process 1: 100%${"█".repeat(12)}┃`);
});

test("a short terminal gives the whole height to the panel and clips text", () => {
  const grid = paint({ exit: false, gaugeColor: "primary", progress: 0.35 }, 20, 4);
  assert.deepEqual(grid.toLines(), [
    "┏Background Process┓",
    "┃██Process 1: 35%  ┃",
    "┗Change color<C> Qu┛",
    "",
  ]);
});

test("progress label rounds to whole percent", () => {
  assert.equal(progressLabel(0), "Process 1: 0%");
  assert.equal(progressLabel(0.35), "Process 1: 35%");
  assert.equal(progressLabel(0.074), "Process 1: 7%");
  assert.equal(progressLabel(1), "Process 1: 100%");
});
