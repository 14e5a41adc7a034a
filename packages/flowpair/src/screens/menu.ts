import {
  type DrawCommand,
  type FrameInput,
  type FrameOutput,
  type Point,
  createDrawList,
  generateEndpoints,
} from "@flowpair/core";
import { resolveMenuCommand } from "../helpers/keybindings.js";
import { MENU_CONTROLS, hitTest, menuButtonRects } from "../helpers/layout.js";
import { reduceFlowState } from "../helpers/state.js";
import { BG, MUTED, PRODUCT_NAME } from "../theme.js";
import type { FlowState, MenuControl, SceneEnv } from "../types.js";
import { button, centeredText } from "./primitives.js";

export function renderMenuScreen(state: FlowState, pointer: Point | null): readonly DrawCommand[] {
  const g = createDrawList();
  g.clear(BG);
  centeredText(g, PRODUCT_NAME, 130, undefined, "title");
  centeredText(g, "Use ↑/↓ or mouse; Enter/Click to select", 180);
  centeredText(g, `Pairs: ${String(state.numPairs)} (change in Config)`, 215, MUTED);

  const rects = menuButtonRects();
  const hovered = hitTest(rects, pointer);
  rects.forEach((rect, i) => {
    const control = MENU_CONTROLS[i];
    if (!control) return;
    button(g, rect, control.label, hovered === i || (hovered === null && state.menuFocus === i));
  });
  return g.build();
}

function wrapFocus(focus: number | null, delta: number): number {
  const n = MENU_CONTROLS.length;
  const from = focus ?? (delta > 0 ? -1 : n);
  return (((from + delta) % n) + n) % n;
}

function applySelection(state: FlowState, control: MenuControl, env: SceneEnv): FlowState {
  if (control === "quit") {
    return reduceFlowState(state, { type: "quit" });
  }
  if (control === "config") {
    return reduceFlowState(state, { type: "open-config" });
  }
  const generated = generateEndpoints(state.numPairs, env.gridSize, {
    rng: env.rng,
    trials: env.trials,
  });
  env.trace.record("generator", "info", "endpoints generated", {
    numPairs: state.numPairs,
    score: generated.score,
    trials: generated.trials,
  });
  return reduceFlowState(state, { type: "open-run", endpoints: generated.pairs });
}

/**
 * Menu tick. Enter picks the hovered control, then the arrow-focused one, then
 * Run. Several selections in one tick collapse to the last; it is applied
 * after every event has been read.
 */
export function stepMenuScene(
  state: FlowState,
  frame: FrameInput,
  env: SceneEnv,
): FrameOutput<FlowState> {
  const commands = renderMenuScreen(state, frame.pointer);
  const rects = menuButtonRects();
  const hovered = hitTest(rects, frame.pointer);

  let next = state;
  let selected: number | null = null;
  for (const event of frame.events) {
    if (event.kind === "quit") {
      next = reduceFlowState(next, { type: "quit" });
      continue;
    }
    if (event.kind === "mouse") {
      if (event.button !== 0) continue;
      const hit = hitTest(rects, { x: event.x, y: event.y });
      if (hit !== null) selected = hit;
      continue;
    }
    const command = resolveMenuCommand(event.key);
    if (command === "quit") {
      next = reduceFlowState(next, { type: "quit" });
    } else if (command === "select") {
      selected = hovered ?? next.menuFocus ?? 0;
    } else if (command === "focus-prev" || command === "focus-next") {
      const delta = command === "focus-next" ? 1 : -1;
      next = reduceFlowState(next, { type: "focus-menu", index: wrapFocus(next.menuFocus, delta) });
    }
  }

  const control = selected === null ? undefined : MENU_CONTROLS[selected];
  if (control) {
    next = applySelection(next, control.id, env);
  }
  return { state: next, commands };
}
