/**
 * packages/core/src/channel.ts: Multi-producer, single-consumer event channel.
 *
 * Senders push without blocking; the single receiver awaits values in the
 * order their send calls completed. The channel reports closed once every
 * sender has closed and nothing is left to deliver.
 */

import { TickboardError } from "./errors.js";

type Deferred<T> = Readonly<{
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}>;

function deferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (err: Error) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface ChannelSender<T> {
  /**
   * Enqueue a value without blocking.
   * Returns false (and drops the value) when the receiver has been closed.
   */
  send(value: T): boolean;
  /** Create another sender feeding the same receiver. */
  clone(): ChannelSender<T>;
  /** Release this sender. Idempotent. */
  close(): void;
  readonly closed: boolean;
}

export interface ChannelReceiver<T> {
  /**
   * Resolve with the oldest pending value, waiting for one if necessary.
   * Rejects with TICKBOARD_CHANNEL_CLOSED once every sender has closed and the
   * queue is drained.
   */
  receive(): Promise<T>;
  /** Discard pending values and refuse further sends. Idempotent. */
  close(): void;
  readonly pending: number;
  readonly closed: boolean;
}

export type Channel<T> = Readonly<{
  sender: ChannelSender<T>;
  receiver: ChannelReceiver<T>;
}>;

function channelClosedError(): TickboardError {
  return new TickboardError(
    "TICKBOARD_CHANNEL_CLOSED",
    "receive() on a channel whose senders have all closed",
  );
}

export function createChannel<T>(): Channel<T> {
  // Values are boxed so `undefined` stays a deliverable payload.
  const queue: Array<Readonly<{ value: T }>> = [];
  let waiter: Deferred<T> | null = null;
  let liveSenders = 0;
  let receiverClosed = false;

  function disconnected(): boolean {
    return liveSenders === 0;
  }

  function deliver(value: T): void {
    if (waiter !== null) {
      const current = waiter;
      waiter = null;
      current.resolve(value);
      return;
    }
    queue.push({ value });
  }

  function failWaiter(): void {
    if (waiter === null) return;
    const current = waiter;
    waiter = null;
    current.reject(channelClosedError());
  }

  function makeSender(): ChannelSender<T> {
    liveSenders++;
    let closed = false;

    const sender: ChannelSender<T> = {
      send(value: T): boolean {
        if (closed) {
          throw new TickboardError("TICKBOARD_INVALID_STATE", "send() on a closed sender");
        }
        if (receiverClosed) return false;
        deliver(value);
        return true;
      },
      clone(): ChannelSender<T> {
        if (closed) {
          throw new TickboardError("TICKBOARD_INVALID_STATE", "clone() on a closed sender");
        }
        return makeSender();
      },
      close(): void {
        if (closed) return;
        closed = true;
        liveSenders--;
        if (disconnected() && queue.length === 0) failWaiter();
      },
      get closed(): boolean {
        return closed;
      },
    };
    return sender;
  }

  const receiver: ChannelReceiver<T> = {
    receive(): Promise<T> {
      if (waiter !== null) {
        return Promise.reject(
          new TickboardError("TICKBOARD_INVALID_STATE", "receive() already pending"),
        );
      }
      const next = queue.shift();
      if (next !== undefined) {
        return Promise.resolve(next.value);
      }
      if (receiverClosed || disconnected()) {
        return Promise.reject(channelClosedError());
      }
      const d = deferred<T>();
      waiter = d;
      return d.promise;
    },
    close(): void {
      if (receiverClosed) return;
      receiverClosed = true;
      queue.length = 0;
      failWaiter();
    },
    get pending(): number {
      return queue.length;
    },
    get closed(): boolean {
      return receiverClosed;
    },
  };

  return { sender: makeSender(), receiver };
}
