import {
  type DrawCommand,
  type DrawList,
  type FrameInput,
  type FrameOutput,
  createDrawList,
  pairColor,
} from "@flowpair/core";
import { resolveRunCommand } from "../helpers/keybindings.js";
import { type GridMetrics, gridMetrics, gridToPx } from "../helpers/layout.js";
import { reduceFlowState } from "../helpers/state.js";
import { BG, GRID_LINE_WIDTH, MUTED, WHITE } from "../theme.js";
import type { FlowState, SceneEnv } from "../types.js";
import { centeredText } from "./primitives.js";

function drawGrid(g: DrawList, m: GridMetrics): void {
  const x1 = m.originX + m.sizePx;
  const y1 = m.originY + m.sizePx;
  for (let i = 0; i <= m.n; i++) {
    const x = m.originX + i * m.cellPx;
    const y = m.originY + i * m.cellPx;
    g.line(m.originX, y, x1, y, GRID_LINE_WIDTH, WHITE);
    g.line(x, m.originY, x, y1, GRID_LINE_WIDTH, WHITE);
  }
}

export function renderRunScreen(state: FlowState, gridSize: number): readonly DrawCommand[] {
  const g = createDrawList();
  const m = gridMetrics(gridSize);
  g.clear(BG);
  centeredText(
    g,
    `${String(gridSize)}x${String(gridSize)} • ${String(state.numPairs)} pairs  —  ESC to menu`,
    28,
    MUTED,
  );
  drawGrid(g, m);
  state.endpoints.forEach((pair, index) => {
    const color = pairColor(index);
    for (const end of pair) {
      const at = gridToPx(m, end);
      g.fillCircle(at.x, at.y, m.endpointRadius, color);
    }
  });
  return g.build();
}

export function stepRunScene(
  state: FlowState,
  frame: FrameInput,
  env: SceneEnv,
): FrameOutput<FlowState> {
  const commands = renderRunScreen(state, env.gridSize);
  let next = state;
  for (const event of frame.events) {
    if (event.kind === "quit") {
      next = reduceFlowState(next, { type: "quit" });
    } else if (event.kind === "key" && resolveRunCommand(event.key) === "back") {
      next = reduceFlowState(next, { type: "open-menu" });
    }
  }
  return { state: next, commands };
}
