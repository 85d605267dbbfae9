import type { Writable } from "node:stream";
import { type CellGrid, TickboardError, describeError } from "@tickboard/core";
import { CLEAR_SCREEN, type ColorSupport, serializeGrid } from "./ansi.js";

export type FrameWriterOptions = Readonly<{
  colorSupport: ColorSupport;
  trace?: (message: string) => void;
}>;

export interface FrameWriter {
  /**
   * Write one full frame; resolves once the stream has accepted it. A frame
   * whose size differs from the previous one clears the screen first.
   */
  draw(grid: CellGrid): Promise<void>;
  readonly frames: number;
  /** Detach from the stream. Later draws reject. */
  dispose(): void;
}

export function createFrameWriter(stdout: Writable, opts: FrameWriterOptions): FrameWriter {
  let frames = 0;
  let disposed = false;
  let streamError: Error | null = null;
  let lastSize: string | null = null;

  const onError = (error: Error): void => {
    streamError = error;
    opts.trace?.(`frames: output stream error: ${describeError(error)}`);
  };
  stdout.on("error", onError);

  return {
    draw(grid: CellGrid): Promise<void> {
      if (disposed) {
        return Promise.reject(new TickboardError("TICKBOARD_INVALID_STATE", "frame writer disposed"));
      }
      if (streamError !== null) return Promise.reject(streamError);

      const size = `${grid.cols}x${grid.rows}`;
      const resized = lastSize !== null && lastSize !== size;
      lastSize = size;
      if (resized) opts.trace?.(`frames: resized to ${size}`);
      const payload = `${resized ? CLEAR_SCREEN : ""}${serializeGrid(grid, opts.colorSupport)}`;
      return new Promise<void>((resolve, reject) => {
        stdout.write(payload, (error?: Error | null) => {
          if (error) {
            reject(error);
            return;
          }
          frames++;
          resolve();
        });
      });
    },
    get frames(): number {
      return frames;
    },
    dispose(): void {
      if (disposed) return;
      disposed = true;
      stdout.off("error", onError);
    },
  };
}
