/**
 * @tickboard/core
 *
 * Runtime-agnostic core for tickboard: the event channel, both producers, the
 * single-owner event loop, and the cell grid the presentation layer paints.
 * This package MUST NOT use Node-specific APIs (Buffer, streams, node:* imports).
 */

export {
  TickboardError,
  type TickboardErrorCode,
  type TickboardErrorOptions,
  describeError,
  isTickboardError,
} from "./errors.js";

export {
  type AppEvent,
  type KeyAction,
  type RawKeyEvent,
  keyPress,
  progressUpdate,
} from "./events.js";

export {
  type Channel,
  type ChannelReceiver,
  type ChannelSender,
  createChannel,
} from "./channel.js";

export {
  DEFAULT_PROGRESS_MAX,
  DEFAULT_PROGRESS_STEP,
  DEFAULT_TICK_INTERVAL_MS,
  type Sleep,
  type TickerOptions,
  type TickerProducerResult,
  createTickerStream,
  progressAfterTicks,
  runTickerProducer,
  sleep,
} from "./producers/ticker.js";

export {
  type InputProducerOptions,
  type InputProducerResult,
  runInputProducer,
} from "./producers/input.js";

export {
  type EventLoopOptions,
  type EventLoopResult,
  runEventLoop,
} from "./app/eventLoop.js";

export {
  type Rgb24,
  type TextStyle,
  mergeTextStyle,
  rgb,
  rgbB,
  rgbG,
  rgbR,
  styleEquals,
} from "./screen/style.js";

export {
  EMPTY_RECT,
  type Rect,
  innerRect,
  isVisibleRect,
  rect,
  splitVertical,
  takeRows,
} from "./screen/layout.js";

export { type Cell, CellGrid, type Viewport, measureText } from "./screen/grid.js";

export {
  type Align,
  type BlockOptions,
  type BorderStyle,
  type GaugeOptions,
  type StyledSegment,
  clamp01,
  drawBlock,
  drawGauge,
  drawSegments,
} from "./screen/widgets.js";
