import type { FrameInput, FrameOutput } from "@flowpair/core";
import type { FlowState, SceneEnv } from "../types.js";
import { stepConfigScene } from "./config.js";
import { stepMenuScene } from "./menu.js";
import { stepRunScene } from "./run.js";

function dispatchScene(
  state: FlowState,
  frame: FrameInput,
  env: SceneEnv,
): FrameOutput<FlowState> {
  const scene = state.scene;
  switch (scene) {
    case "menu":
      return stepMenuScene(state, frame, env);
    case "config":
      return stepConfigScene(state, frame);
    case "run":
      return stepRunScene(state, frame, env);
    default: {
      const unknown: never = scene;
      env.trace.record("state", "warn", "unknown scene", { scene: String(unknown) });
      return { state: { ...state, scene: "menu" }, commands: Object.freeze([]) };
    }
  }
}

/** One tick of the scene state machine. */
export function stepScene(
  state: FlowState,
  frame: FrameInput,
  env: SceneEnv,
): FrameOutput<FlowState> {
  const out = dispatchScene(state, frame, env);
  if (out.state.scene !== state.scene) {
    env.trace.record("state", "info", "scene change", {
      from: String(state.scene),
      to: out.state.scene,
    });
  }
  if (state.running && !out.state.running) {
    env.trace.record("state", "info", "quit requested", { scene: String(state.scene) });
  }
  return out;
}

export { renderConfigScreen, stepConfigScene } from "./config.js";
export { renderMenuScreen, stepMenuScene } from "./menu.js";
export { renderRunScreen, stepRunScene } from "./run.js";
