/**
 * packages/core/src/app/frameLoop.ts — Fixed-rate frame loop.
 *
 * Each tick reads the pointer, drains input, runs the step function and
 * presents its commands, then sleeps out the rest of the tick. Single
 * threaded: a tick completes before the next one starts. The surface is
 * disposed when the loop ends, whether it stopped or threw (a failing trace
 * sink included).
 */

import type { DrawCommand } from "../draw/commands.js";
import { type DebugTrace, NOOP_TRACE } from "../debug/trace.js";
import type { InputEvent, Point, RenderSurface } from "../surface.js";
import { computeFrameDelay, computeFrameInterval } from "./tickTiming.js";

export type FrameInput = Readonly<{
  frameId: number;
  pointer: Point | null;
  events: readonly InputEvent[];
}>;

export type FrameOutput<S> = Readonly<{
  state: S;
  /** Empty means nothing is presented this tick. */
  commands: readonly DrawCommand[];
}>;

export type FrameClock = Readonly<{
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}>;

export type FrameLoopOptions<S> = Readonly<{
  surface: RenderSurface;
  initialState: S;
  step: (state: S, frame: FrameInput) => FrameOutput<S>;
  isRunning: (state: S) => boolean;
  clock: FrameClock;
  fpsCap?: number;
  trace?: DebugTrace;
}>;

export async function runFrameLoop<S>(opts: FrameLoopOptions<S>): Promise<S> {
  const { surface, clock } = opts;
  const trace = opts.trace ?? NOOP_TRACE;
  const intervalMs = computeFrameInterval(opts.fpsCap ?? 60);

  let state = opts.initialState;
  let frameId = 0;

  try {
    trace.record("frame", "info", "loop start", { intervalMs });
    while (opts.isRunning(state)) {
      const frameStart = clock.now();
      frameId++;
      trace.setFrame(frameId);

      const pointer = surface.pointer();
      const events = surface.pollEvents();
      const out = opts.step(state, { frameId, pointer, events });
      if (out.commands.length > 0) {
        surface.present(out.commands);
      }
      state = out.state;
      trace.record("frame", "trace", "tick", {
        events: events.length,
        commands: out.commands.length,
      });

      await clock.sleep(computeFrameDelay(frameStart, clock.now(), intervalMs));
    }
    trace.record("frame", "info", "loop stop", { frames: frameId });
  } finally {
    await surface.dispose();
  }

  return state;
}
