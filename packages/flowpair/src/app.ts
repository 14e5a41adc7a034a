import {
  type DebugTrace,
  type FrameClock,
  NOOP_TRACE,
  type RenderSurface,
  type Rng,
  createDebugTrace,
  defaultRng,
  runFrameLoop,
} from "@flowpair/core";
import { type FlowEnv, resolveFlowConfig } from "./config.js";
import { createJsonLinesSink } from "./helpers/debug.js";
import { createInitialState } from "./helpers/state.js";
import { stepScene } from "./screens/index.js";
import type { SceneEnv } from "./types.js";

export type RunFlowpairOptions = Readonly<{
  env: FlowEnv;
  createSurface: (title: string) => RenderSurface;
  clock: FrameClock;
  /** Receives whole lines, newline included. */
  writeError: (line: string) => void;
  rng?: Rng;
}>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the game until it quits. Resolves to the process exit code: 0 after a
 * quit, 1 after a fatal error. The surface is restored before anything is
 * reported.
 */
export async function runFlowpair(opts: RunFlowpairOptions): Promise<number> {
  let trace: DebugTrace = NOOP_TRACE;
  let surface: RenderSurface | null = null;
  try {
    const config = resolveFlowConfig(opts.env);
    trace = createDebugTrace(
      config.debug.enabled ? { sink: createJsonLinesSink(config.debug.logPath) } : {},
    );
    surface = opts.createSurface(config.title);
    const env: SceneEnv = {
      rng: opts.rng ?? defaultRng,
      gridSize: config.gridSize,
      trials: config.trials,
      trace,
    };
    await runFrameLoop({
      surface,
      initialState: createInitialState(),
      step: (state, frame) => stepScene(state, frame, env),
      isRunning: (state) => state.running,
      clock: opts.clock,
      fpsCap: config.fpsCap,
      trace,
    });
    return 0;
  } catch (error) {
    const message = describeError(error);
    // dispose() is idempotent; the loop may already have run it.
    if (surface) {
      try {
        await surface.dispose();
      } catch (disposeError) {
        opts.writeError(`flowpair: terminal restore failed: ${describeError(disposeError)}\n`);
      }
    }
    opts.writeError(`flowpair: ${message}\n`);
    try {
      trace.record("error", "error", "fatal", { message });
    } catch (traceError) {
      opts.writeError(`flowpair: debug log unavailable: ${describeError(traceError)}\n`);
    }
    return 1;
  }
}
