/**
 * @flowpair/core — host-independent pieces of the flowpair game: grid cells,
 * endpoint generation, draw commands and rasterization, the surface contract
 * and the frame loop.
 */

export { FlowError, isFlowError, type FlowErrorCode } from "./errors.js";
export { defaultRng, randomIndex, type Rng } from "./rng.js";

export {
  allCells,
  cell,
  cellKey,
  flattenPairs,
  manhattan,
  sameCell,
  type Cell,
  type EndpointPair,
} from "./grid/cells.js";
export {
  DEFAULT_ENDPOINT_TRIALS,
  generateEndpoints,
  pairCells,
  sampleDistinctCells,
  scorePairs,
  type EndpointGeneration,
  type EndpointTrialObserver,
  type GenerateEndpointsOptions,
} from "./grid/endpoints.js";

export {
  createDrawList,
  rectCenter,
  rectContains,
  type Color,
  type DrawCommand,
  type DrawList,
  type FontRole,
  type Rect,
} from "./draw/commands.js";
export {
  IDENTITY_TRANSFORM,
  createFrameBuffer,
  paintCommands,
  parseHexColor,
  readPixel,
  type FrameBuffer,
  type Pixel,
  type RasterTransform,
  type TextOverlay,
} from "./draw/raster.js";
export { PALETTE, pairColor } from "./palette.js";

export {
  LOGICAL_FRAME_SIZE,
  type FrameSize,
  type InputEvent,
  type Point,
  type RenderSurface,
} from "./surface.js";

export { computeFrameDelay, computeFrameInterval } from "./app/tickTiming.js";
export {
  runFrameLoop,
  type FrameClock,
  type FrameInput,
  type FrameLoopOptions,
  type FrameOutput,
} from "./app/frameLoop.js";

export {
  NOOP_TRACE,
  createDebugTrace,
  severityAtLeast,
  type DebugCategory,
  type DebugRecord,
  type DebugSeverity,
  type DebugSink,
  type DebugTrace,
  type DebugTraceOptions,
} from "./debug/trace.js";
