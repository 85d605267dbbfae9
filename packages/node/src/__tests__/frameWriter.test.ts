import { FakeTtyOutput, assert, describe, test } from "@tickboard/testkit";
import { CellGrid } from "@tickboard/core";
import { serializeGrid } from "../output/ansi.js";
import { createFrameWriter } from "../output/frameWriter.js";

const TRUECOLOR = { level: 3, noColor: false } as const;

function sampleGrid(): CellGrid {
  const grid = new CellGrid({ cols: 4, rows: 1 });
  grid.drawText(0, 0, "ok");
  return grid;
}

describe("createFrameWriter", () => {
  test("writes one serialized frame per draw", async () => {
    const stdout = new FakeTtyOutput();
    const writer = createFrameWriter(stdout, { colorSupport: TRUECOLOR });
    const grid = sampleGrid();

    await writer.draw(grid);
    await writer.draw(grid);

    assert.equal(writer.frames, 2);
    assert.deepEqual(stdout.writes, [
      serializeGrid(grid, TRUECOLOR),
      serializeGrid(grid, TRUECOLOR),
    ]);
  });

  test("clears the screen before a frame of a new size", async () => {
    const stdout = new FakeTtyOutput();
    const traces: string[] = [];
    const writer = createFrameWriter(stdout, {
      colorSupport: TRUECOLOR,
      trace: (message) => traces.push(message),
    });
    const wide = sampleGrid();
    const narrow = new CellGrid({ cols: 2, rows: 1 });
    narrow.drawText(0, 0, "ok");

    await writer.draw(wide);
    await writer.draw(narrow);
    await writer.draw(narrow);

    assert.deepEqual(stdout.writes, [
      serializeGrid(wide, TRUECOLOR),
      `\u001b[2J${serializeGrid(narrow, TRUECOLOR)}`,
      serializeGrid(narrow, TRUECOLOR),
    ]);
    assert.deepEqual(traces, ["frames: resized to 2x1"]);
  });

  test("rejects when the stream fails and keeps rejecting afterwards", async () => {
    const failure = new Error("EPIPE");
    const stdout = new FakeTtyOutput({ failWith: failure });
    const traces: string[] = [];
    const writer = createFrameWriter(stdout, {
      colorSupport: TRUECOLOR,
      trace: (message) => traces.push(message),
    });

    await assert.rejects(writer.draw(sampleGrid()), /EPIPE/);
    await new Promise((resolve) => setImmediate(resolve));
    await assert.rejects(writer.draw(sampleGrid()), /EPIPE/);
    assert.equal(writer.frames, 0);
    assert.deepEqual(traces, ["frames: output stream error: Error: EPIPE"]);
  });

  test("rejects draws after dispose", async () => {
    const writer = createFrameWriter(new FakeTtyOutput(), { colorSupport: TRUECOLOR });
    writer.dispose();
    await assert.rejects(writer.draw(sampleGrid()), { code: "TICKBOARD_INVALID_STATE" });
  });
});
