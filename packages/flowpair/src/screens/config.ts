import {
  type DrawCommand,
  type FrameInput,
  type FrameOutput,
  type Point,
  createDrawList,
} from "@flowpair/core";
import { type ConfigCommand, resolveConfigCommand } from "../helpers/keybindings.js";
import { PAIR_CHOICES, configButtonRects, hitTest } from "../helpers/layout.js";
import { reduceFlowState } from "../helpers/state.js";
import {
  BG,
  BUTTON_RADIUS,
  BUTTON_SELECTED,
  MUTED,
  SELECTED_BORDER_WIDTH,
} from "../theme.js";
import type { FlowState, PairCount } from "../types.js";
import { button, centeredText } from "./primitives.js";

const PAIRS_BY_COMMAND: Readonly<Record<Exclude<ConfigCommand, "back">, PairCount>> =
  Object.freeze({
    "pairs-3": 3,
    "pairs-4": 4,
    "pairs-5": 5,
  });

export function renderConfigScreen(
  state: FlowState,
  pointer: Point | null,
): readonly DrawCommand[] {
  const g = createDrawList();
  g.clear(BG);
  centeredText(g, "Config", 120, undefined, "title");
  centeredText(g, "Choose number of color pairs for 5x5:", 170);
  centeredText(g, "[3]  [4]  [5]", 215);
  centeredText(g, "Press 3/4/5, or click buttons. ESC to return.", 255, MUTED);

  const rects = configButtonRects();
  const hovered = hitTest(rects, pointer);
  rects.forEach((rect, i) => {
    const value = PAIR_CHOICES[i];
    if (value === undefined) return;
    button(g, rect, `${String(value)} pairs`, hovered === i);
    if (value === state.numPairs) {
      g.strokeRoundedRect(rect, BUTTON_RADIUS, SELECTED_BORDER_WIDTH, BUTTON_SELECTED);
    }
  });
  return g.build();
}

/** Config tick. Events apply in order. */
export function stepConfigScene(state: FlowState, frame: FrameInput): FrameOutput<FlowState> {
  const commands = renderConfigScreen(state, frame.pointer);
  const rects = configButtonRects();

  let next = state;
  for (const event of frame.events) {
    if (event.kind === "quit") {
      next = reduceFlowState(next, { type: "quit" });
      continue;
    }
    if (event.kind === "mouse") {
      if (event.button !== 0) continue;
      const hit = hitTest(rects, { x: event.x, y: event.y });
      const value = hit === null ? undefined : PAIR_CHOICES[hit];
      if (value !== undefined) next = reduceFlowState(next, { type: "set-pairs", numPairs: value });
      continue;
    }
    const command = resolveConfigCommand(event.key);
    if (command === "back") {
      next = reduceFlowState(next, { type: "open-menu" });
    } else if (command) {
      next = reduceFlowState(next, { type: "set-pairs", numPairs: PAIRS_BY_COMMAND[command] });
    }
  }
  return { state: next, commands };
}
