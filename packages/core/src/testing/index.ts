export { TestEventBuilder } from "./events.js";
export { createTestSurface } from "./surface.js";
export type { TestSurface, TestSurfaceOptions } from "./surface.js";
export { createTestClock } from "./clock.js";
export type { TestClock } from "./clock.js";
