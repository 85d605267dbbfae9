import { PassThrough, Writable } from "node:stream";

/**
 * Stand-in for `process.stdin` on a TTY: data pushed with `type()` comes out
 * as `data` events, and raw-mode switches are recorded.
 */
export class FakeTtyInput extends PassThrough {
  readonly isTTY = true;
  isRaw = false;
  readonly rawModeCalls: boolean[] = [];

  setRawMode(mode: boolean): this {
    this.rawModeCalls.push(mode);
    this.isRaw = mode;
    return this;
  }

  type(text: string): void {
    this.write(Buffer.from(text, "utf8"));
  }
}

export type FakeTtyOutputOptions = Readonly<{
  columns?: number;
  rows?: number;
  colorDepth?: number;
  /** Make every write fail with this error. */
  failWith?: Error;
}>;

/** Stand-in for `process.stdout` on a TTY that records everything written. */
export class FakeTtyOutput extends Writable {
  readonly isTTY = true;
  columns: number;
  rows: number;
  private readonly colorDepth: number;
  private readonly failWith: Error | undefined;
  private readonly chunks: string[] = [];

  constructor(opts: FakeTtyOutputOptions = {}) {
    super();
    this.columns = opts.columns ?? 80;
    this.rows = opts.rows ?? 24;
    this.colorDepth = opts.colorDepth ?? 24;
    this.failWith = opts.failWith;
  }

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (this.failWith !== undefined) {
      callback(this.failWith);
      return;
    }
    this.chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
    callback();
  }

  getColorDepth(): number {
    return this.colorDepth;
  }

  get output(): string {
    return this.chunks.join("");
  }

  get writes(): readonly string[] {
    return this.chunks;
  }
}
