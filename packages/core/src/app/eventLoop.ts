/**
 * packages/core/src/app/eventLoop.ts: Single-owner draw/receive/update loop.
 *
 * The loop is the only writer of the application state. It draws, waits for
 * the next event, folds it into the state, and repeats until `isExited`
 * reports true. Nothing is drawn after the exit transition.
 */

import type { ChannelReceiver } from "../channel.js";
import { TickboardError, describeError } from "../errors.js";

export type EventLoopOptions<S, E> = Readonly<{
  receiver: ChannelReceiver<E>;
  initialState: S;
  update: (state: S, event: E) => S;
  isExited: (state: S) => boolean;
  draw: (state: S) => void | Promise<void>;
  trace?: (message: string) => void;
}>;

export type EventLoopResult<S> = Readonly<{
  state: S;
  events: number;
  frames: number;
}>;

async function drawFrame<S>(draw: (state: S) => void | Promise<void>, state: S): Promise<void> {
  try {
    await draw(state);
  } catch (error) {
    throw new TickboardError("TICKBOARD_DRAW_FAILED", `draw failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}

/**
 * Run until the state reports exited.
 *
 * Rejects with TICKBOARD_DRAW_FAILED when a draw throws and with
 * TICKBOARD_CHANNEL_CLOSED when the channel runs dry; neither is retried.
 */
export async function runEventLoop<S, E>(
  opts: EventLoopOptions<S, E>,
): Promise<EventLoopResult<S>> {
  const { receiver, update, isExited, draw } = opts;
  let state = opts.initialState;
  let events = 0;
  let frames = 0;

  while (!isExited(state)) {
    await drawFrame(draw, state);
    frames++;
    const event = await receiver.receive();
    events++;
    state = update(state, event);
  }

  opts.trace?.(`loop: exited after ${events} events, ${frames} frames`);
  return { state, events, frames };
}
