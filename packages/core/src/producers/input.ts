import type { ChannelSender } from "../channel.js";
import { describeError } from "../errors.js";
import { type AppEvent, type RawKeyEvent, keyPress } from "../events.js";

export type InputProducerOptions = Readonly<{
  signal?: AbortSignal;
  trace?: (message: string) => void;
}>;

export type InputProducerResult =
  | Readonly<{ reason: "source-ended" | "receiver-closed" | "aborted"; forwarded: number }>
  | Readonly<{ reason: "source-failed"; forwarded: number; error: unknown }>;

/**
 * Forward key presses from `source` into the channel.
 *
 * Releases and repeats are dropped. A failing source ends the producer: the
 * failure is returned (and traced), not rethrown, since input loss is not
 * fatal to the consumer by itself. Always closes `sender` before returning.
 */
export async function runInputProducer(
  sender: ChannelSender<AppEvent>,
  source: AsyncIterable<RawKeyEvent>,
  opts: InputProducerOptions = {},
): Promise<InputProducerResult> {
  let forwarded = 0;
  try {
    for await (const event of source) {
      if (opts.signal?.aborted === true) {
        return { reason: "aborted", forwarded };
      }
      if (event.action !== "down") continue;
      if (!sender.send(keyPress(event.key))) {
        opts.trace?.(`input: receiver closed after ${forwarded} key presses`);
        return { reason: "receiver-closed", forwarded };
      }
      forwarded++;
    }
    if (opts.signal?.aborted === true) {
      return { reason: "aborted", forwarded };
    }
    opts.trace?.(`input: source ended after ${forwarded} key presses`);
    return { reason: "source-ended", forwarded };
  } catch (error) {
    opts.trace?.(`input: source failed: ${describeError(error)}`);
    return { reason: "source-failed", forwarded, error };
  } finally {
    sender.close();
  }
}
