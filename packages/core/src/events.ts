/**
 * Event types exchanged between producers and the application loop.
 */

/** Key event action: down (press), up (release), or repeat (held). */
export type KeyAction = "down" | "up" | "repeat";

/**
 * A key event as reported by an input source, before press filtering.
 *
 * `key` follows the keybinding naming convention: printable characters as
 * themselves ("q", "Q"), named keys ("enter", "escape", "up"), and chords
 * ("ctrl+c", "alt+x").
 */
export type RawKeyEvent = Readonly<{
  key: string;
  action: KeyAction;
}>;

/**
 * Events consumed by the application loop.
 *
 * - `keyPress`: a key was pressed (releases and repeats never reach the loop).
 * - `progressUpdate`: the progress source reports a new value in [0, 1].
 */
export type AppEvent =
  | Readonly<{ kind: "keyPress"; key: string }>
  | Readonly<{ kind: "progressUpdate"; value: number }>;

export function keyPress(key: string): AppEvent {
  return { kind: "keyPress", key };
}

export function progressUpdate(value: number): AppEvent {
  return { kind: "progressUpdate", value };
}
