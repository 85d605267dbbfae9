import assert from "node:assert/strict";
import test from "node:test";
import { createKeyDecoder } from "../input/keyDecoder.js";

function keys(chunk: string): string[] {
  return createKeyDecoder()
    .decode(chunk)
    .map((event) => event.key);
}

test("printable characters decode as themselves, case preserved", () => {
  assert.deepEqual(keys("qcQ1 "), ["q", "c", "Q", "1", " "]);
  assert.deepEqual(keys("é😀"), ["é", "😀"]);
});

test("every decoded event is a key press", () => {
  const events = createKeyDecoder().decode("a\r");
  assert.deepEqual(events, [
    { key: "a", action: "down" },
    { key: "enter", action: "down" },
  ]);
});

test("control bytes map to named keys and ctrl chords", () => {
  assert.deepEqual(keys("\r\n\t\u007f\b"), ["enter", "enter", "tab", "backspace", "backspace"]);
  assert.deepEqual(keys("\u0003\u0011\u0000"), ["ctrl+c", "ctrl+q", "ctrl+space"]);
  assert.deepEqual(keys("\u001c"), []);
});

test("escape alone, doubled, and as an alt prefix", () => {
  assert.deepEqual(keys("\u001b"), ["escape"]);
  assert.deepEqual(keys("\u001b\u001b"), ["escape", "escape"]);
  assert.deepEqual(keys("\u001bx"), ["alt+x"]);
  assert.deepEqual(keys("\u001b\r"), ["alt+enter"]);
});

test("CSI and SS3 sequences decode to navigation keys", () => {
  assert.deepEqual(keys("\u001b[A\u001b[B\u001b[C\u001b[D"), ["up", "down", "right", "left"]);
  assert.deepEqual(keys("\u001bOA\u001bOH\u001bOP"), ["up", "home", "f1"]);
  assert.deepEqual(keys("\u001b[3~\u001b[5~\u001b[6~\u001b[15~"), [
    "delete",
    "pageup",
    "pagedown",
    "f5",
  ]);
  assert.deepEqual(keys("\u001b[Z"), ["shift+tab"]);
});

test("CSI modifier parameters become chord prefixes", () => {
  assert.deepEqual(keys("\u001b[1;5A"), ["ctrl+up"]);
  assert.deepEqual(keys("\u001b[1;2D"), ["shift+left"]);
  assert.deepEqual(keys("\u001b[3;3~"), ["alt+delete"]);
});

test("unknown and truncated sequences are dropped without eating later keys", () => {
  assert.deepEqual(keys("\u001b[99~q"), ["q"]);
  assert.deepEqual(keys("\u001b[12"), []);
  assert.deepEqual(keys("\u001bO"), []);
});
