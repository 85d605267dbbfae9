import assert from "node:assert/strict";
import test from "node:test";
import { TickboardError, describeError, isTickboardError } from "../errors.js";

test("TickboardError carries code, name and cause", () => {
  const cause = new Error("disk gone");
  const error = new TickboardError("TICKBOARD_DRAW_FAILED", "draw failed", { cause });
  assert.equal(error.name, "TickboardError");
  assert.equal(error.code, "TICKBOARD_DRAW_FAILED");
  assert.equal(error.message, "draw failed");
  assert.equal(error.cause, cause);
});

test("TickboardError defaults its message to the code", () => {
  const error = new TickboardError("TICKBOARD_CHANNEL_CLOSED");
  assert.equal(error.message, "TICKBOARD_CHANNEL_CLOSED");
  assert.equal(error.cause, undefined);
});

test("isTickboardError narrows by code", () => {
  const error = new TickboardError("TICKBOARD_INVALID_STATE");
  assert.equal(isTickboardError(error), true);
  assert.equal(isTickboardError(error, "TICKBOARD_INVALID_STATE"), true);
  assert.equal(isTickboardError(error, "TICKBOARD_DRAW_FAILED"), false);
  assert.equal(isTickboardError(new Error("plain")), false);
});

test("describeError formats errors, strings and other values", () => {
  assert.equal(describeError(new RangeError("bad size")), "RangeError: bad size");
  assert.equal(describeError("oops"), "oops");
  assert.equal(describeError({ code: 3 }), '{"code":3}');
  assert.equal(describeError(undefined), "undefined");
});
