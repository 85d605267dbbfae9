/**
 * @tickboard/node
 *
 * Node terminal backend: takes over the TTY, turns stdin bytes into key
 * events, and writes painted cell grids as ANSI frames.
 */

export {
  type TerminalSession,
  type TerminalSessionOptions,
  type TtyInput,
  type TtyOutput,
  openTerminalSession,
  withTerminalSession,
} from "./terminal/session.js";

export { type KeyDecoder, createKeyDecoder } from "./input/keyDecoder.js";
export { type KeySourceOptions, readKeyEvents } from "./input/keySource.js";

export {
  CLEAR_SCREEN,
  CURSOR_HOME,
  ENTER_ALT_SCREEN,
  HIDE_CURSOR,
  LEAVE_ALT_SCREEN,
  SGR_RESET,
  SHOW_CURSOR,
  type ColorLevel,
  type ColorSupport,
  detectColorSupport,
  serializeGrid,
  styleToSgr,
  toAnsi16Code,
  toAnsi256Code,
} from "./output/ansi.js";

export { type FrameWriter, type FrameWriterOptions, createFrameWriter } from "./output/frameWriter.js";
export { FALLBACK_VIEWPORT, readViewport } from "./output/viewport.js";

export {
  TRACE_FILE_ENV,
  type TraceLog,
  type TraceLogOptions,
  createTraceLog,
  resolveTraceFile,
} from "./trace.js";
