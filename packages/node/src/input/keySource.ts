import { type Readable, addAbortSignal } from "node:stream";
import type { RawKeyEvent } from "@tickboard/core";
import { createKeyDecoder } from "./keyDecoder.js";

export type KeySourceOptions = Readonly<{
  /** Aborting destroys the stream and ends the iteration quietly. */
  signal?: AbortSignal;
}>;

/**
 * Read key events from a raw-mode input stream.
 *
 * Ends when the stream ends or `signal` aborts; stream errors are thrown to
 * the consumer.
 */
export async function* readKeyEvents(
  stdin: Readable,
  opts: KeySourceOptions = {},
): AsyncGenerator<RawKeyEvent, void, void> {
  const decoder = createKeyDecoder();
  const signal = opts.signal;
  if (signal !== undefined) addAbortSignal(signal, stdin);

  try {
    for await (const chunk of stdin) {
      const value: unknown = chunk;
      const text =
        typeof value === "string"
          ? value
          : value instanceof Uint8Array
            ? Buffer.from(value).toString("utf8")
            : String(value);
      yield* decoder.decode(text);
    }
  } catch (error) {
    if (signal?.aborted === true) return;
    throw error;
  }
}
