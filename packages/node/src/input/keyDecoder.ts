/**
 * packages/node/src/input/keyDecoder.ts: Decode raw-mode stdin text into key events.
 *
 * Legacy terminal input only reports presses, so every decoded event has
 * action "down". Each chunk is decoded on its own; an escape sequence split
 * across two chunks decodes as a lone escape followed by plain characters.
 *
 * Key names follow the keybinding convention: "q", "Q", "enter", "up",
 * "ctrl+c", "alt+x", "shift+tab".
 */

import type { RawKeyEvent } from "@tickboard/core";

const ESC = "\u001b";

const CSI_FINAL_KEYS: Readonly<Record<string, string>> = Object.freeze({
  A: "up",
  B: "down",
  C: "right",
  D: "left",
  H: "home",
  F: "end",
  P: "f1",
  Q: "f2",
  R: "f3",
  S: "f4",
});

const TILDE_KEYS: Readonly<Record<string, string>> = Object.freeze({
  "1": "home",
  "2": "insert",
  "3": "delete",
  "4": "end",
  "5": "pageup",
  "6": "pagedown",
  "7": "home",
  "8": "end",
  "15": "f5",
  "17": "f6",
  "18": "f7",
  "19": "f8",
  "20": "f9",
  "21": "f10",
  "23": "f11",
  "24": "f12",
});

type Decoded = Readonly<{ key: string | null; length: number }>;

function down(key: string): RawKeyEvent {
  return { key, action: "down" };
}

/** xterm modifier parameter: 1 + (shift ? 1 : 0) + (alt ? 2 : 0) + (ctrl ? 4 : 0). */
function withModifiers(key: string, modifierParam: string | undefined): string {
  if (modifierParam === undefined) return key;
  const value = Number.parseInt(modifierParam, 10);
  if (!Number.isFinite(value) || value <= 1) return key;
  const bits = value - 1;
  let prefix = "";
  if ((bits & 4) !== 0) prefix += "ctrl+";
  if ((bits & 2) !== 0) prefix += "alt+";
  if ((bits & 1) !== 0) prefix += "shift+";
  return `${prefix}${key}`;
}

function isCsiFinalByte(code: number): boolean {
  return code >= 0x40 && code <= 0x7e;
}

function decodeCsi(text: string, start: number): Decoded {
  // text[start] is ESC, text[start + 1] is "["
  let end = start + 2;
  while (end < text.length && !isCsiFinalByte(text.charCodeAt(end))) end++;
  if (end >= text.length) return { key: null, length: text.length - start };

  const params = text.slice(start + 2, end).split(";");
  const final = text[end] ?? "";
  const length = end - start + 1;

  if (final === "~") {
    const base = TILDE_KEYS[params[0] ?? ""];
    return { key: base === undefined ? null : withModifiers(base, params[1]), length };
  }
  if (final === "Z") return { key: "shift+tab", length };

  const base = CSI_FINAL_KEYS[final];
  return { key: base === undefined ? null : withModifiers(base, params[1]), length };
}

function decodeSs3(text: string, start: number): Decoded {
  const final = text[start + 2];
  if (final === undefined) return { key: null, length: text.length - start };
  return { key: CSI_FINAL_KEYS[final] ?? null, length: 3 };
}

function decodeControl(code: number): string | null {
  if (code === 0x0d || code === 0x0a) return "enter";
  if (code === 0x09) return "tab";
  if (code === 0x7f || code === 0x08) return "backspace";
  if (code === 0x00) return "ctrl+space";
  if (code >= 0x01 && code <= 0x1a) return `ctrl+${String.fromCharCode(code + 0x60)}`;
  return null;
}

function decodePlain(text: string, start: number): Decoded {
  const codePoint = text.codePointAt(start);
  if (codePoint === undefined) return { key: null, length: 1 };
  const length = codePoint > 0xffff ? 2 : 1;
  if (codePoint < 0x20 || codePoint === 0x7f) {
    return { key: decodeControl(codePoint), length };
  }
  return { key: String.fromCodePoint(codePoint), length };
}

function decodeEscape(text: string, start: number): Decoded {
  const next = text[start + 1];
  if (next === undefined || next === ESC) return { key: "escape", length: 1 };
  if (next === "[") return decodeCsi(text, start);
  if (next === "O") return decodeSs3(text, start);

  const chord = decodePlain(text, start + 1);
  return {
    key: chord.key === null ? null : `alt+${chord.key}`,
    length: 1 + chord.length,
  };
}

export interface KeyDecoder {
  decode(chunk: string): RawKeyEvent[];
}

export function createKeyDecoder(): KeyDecoder {
  return {
    decode(chunk: string): RawKeyEvent[] {
      const events: RawKeyEvent[] = [];
      let index = 0;
      while (index < chunk.length) {
        const decoded =
          chunk[index] === ESC ? decodeEscape(chunk, index) : decodePlain(chunk, index);
        if (decoded.key !== null) events.push(down(decoded.key));
        index += Math.max(1, decoded.length);
      }
      return events;
    },
  };
}
