export { assert, describe, test } from "./nodeTest.js";
export { type HeadlessScreen, type ScreenSnapshot, createScreen } from "./screen.js";
export { FakeTtyInput, FakeTtyOutput, type FakeTtyOutputOptions } from "./fakeTty.js";
