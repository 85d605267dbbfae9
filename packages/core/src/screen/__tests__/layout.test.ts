import assert from "node:assert/strict";
import test from "node:test";
import { innerRect, rect, splitVertical, takeRows } from "../layout.js";

test("splitVertical gives floor(percent) rows and the remainder to the last region", () => {
  assert.deepEqual(splitVertical(rect(0, 0, 80, 24), [20, 80]), [
    { x: 0, y: 0, w: 80, h: 4 },
    { x: 0, y: 4, w: 80, h: 20 },
  ]);
  assert.deepEqual(splitVertical(rect(2, 1, 10, 10), [20, 80]), [
    { x: 2, y: 1, w: 10, h: 2 },
    { x: 2, y: 3, w: 10, h: 8 },
  ]);
});

test("splitVertical clamps out-of-range percentages", () => {
  assert.deepEqual(splitVertical(rect(0, 0, 5, 6), [150, 50]), [
    { x: 0, y: 0, w: 5, h: 6 },
    { x: 0, y: 6, w: 5, h: 0 },
  ]);
});

test("innerRect and takeRows", () => {
  assert.deepEqual(innerRect(rect(0, 0, 10, 3)), { x: 1, y: 1, w: 8, h: 1 });
  assert.deepEqual(innerRect(rect(4, 4, 1, 3)), { x: 5, y: 5, w: 0, h: 0 });
  assert.deepEqual(takeRows(rect(0, 4, 80, 20), 3), { x: 0, y: 4, w: 80, h: 3 });
  assert.deepEqual(takeRows(rect(0, 4, 80, 2), 3), { x: 0, y: 4, w: 80, h: 2 });
});

test("rect floors sizes and rejects negatives", () => {
  assert.deepEqual(rect(1, 2, 3.9, -1), { x: 1, y: 2, w: 3, h: 0 });
});
