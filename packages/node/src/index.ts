export {
  createNodeSurface,
  type NodeSurfaceOptions,
  type SignalTarget,
} from "./nodeSurface.js";
export { createNodeClock } from "./clock.js";
export {
  DEFAULT_TERMINAL_FONTS,
  HALF_BLOCK,
  blitFrame,
  composeCells,
  serializeCells,
  type StyledCell,
  type TerminalFont,
  type TerminalFonts,
} from "./terminal/blit.js";
export {
  createInputDecoder,
  type DecodedInput,
  type InputDecoder,
  type MouseAction,
} from "./terminal/input.js";
export { readTerminalSize, type TerminalSize } from "./terminal/size.js";
export { cellToLogical, computeViewport, type Viewport } from "./terminal/viewport.js";
