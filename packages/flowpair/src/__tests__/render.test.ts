import assert from "node:assert/strict";
import test from "node:test";
import { type DrawCommand, cell, pairColor } from "@flowpair/core";
import { createInitialState, reduceFlowState } from "../helpers/state.js";
import { renderConfigScreen, renderMenuScreen, renderRunScreen } from "../screens/index.js";

function texts(commands: readonly DrawCommand[]): string[] {
  return commands.flatMap((c) => (c.kind === "text" ? [c.text] : []));
}

function fills(commands: readonly DrawCommand[]): string[] {
  return commands.flatMap((c) => (c.kind === "fillRoundedRect" ? [c.color] : []));
}

test("menu screen draws title, help and the three controls", () => {
  const commands = renderMenuScreen(createInitialState(), null);
  assert.deepEqual(commands[0], { kind: "clear", color: "#000000" });
  assert.deepEqual(texts(commands), [
    "Flow (prototype)",
    "Use ↑/↓ or mouse; Enter/Click to select",
    "Pairs: 3 (change in Config)",
    "Run",
    "Config",
    "Quit",
  ]);
  assert.deepEqual(commands[1], {
    kind: "text",
    text: "Flow (prototype)",
    x: 360,
    y: 130,
    color: "#ffffff",
    font: "title",
  });
});

test("menu highlights the hovered control", () => {
  const commands = renderMenuScreen(createInitialState(), { x: 360, y: 310 });
  assert.deepEqual(fills(commands), ["#404040", "#202020", "#202020"]);
});

test("menu highlights arrow focus when nothing is hovered", () => {
  const focused = reduceFlowState(createInitialState(), { type: "focus-menu", index: 2 });
  assert.deepEqual(fills(renderMenuScreen(focused, null)), ["#202020", "#202020", "#404040"]);
});

test("config screen outlines the current pair count", () => {
  const state = reduceFlowState(createInitialState(), { type: "set-pairs", numPairs: 4 });
  const commands = renderConfigScreen(state, null);
  assert.deepEqual(texts(commands), [
    "Config",
    "Choose number of color pairs for 5x5:",
    "[3]  [4]  [5]",
    "Press 3/4/5, or click buttons. ESC to return.",
    "3 pairs",
    "4 pairs",
    "5 pairs",
  ]);
  const outlines = commands.filter((c) => c.kind === "strokeRoundedRect" && c.width === 3);
  assert.deepEqual(outlines, [
    {
      kind: "strokeRoundedRect",
      x: 315,
      y: 320,
      w: 90,
      h: 60,
      radius: 10,
      width: 3,
      color: "#c8c8c8",
    },
  ]);
});

test("run screen draws the grid and one circle per endpoint", () => {
  const state = reduceFlowState(createInitialState(), {
    type: "open-run",
    endpoints: [
      [cell(0, 0), cell(4, 4)],
      [cell(0, 4), cell(4, 0)],
      [cell(2, 1), cell(2, 3)],
    ],
  });
  const commands = renderRunScreen(state, 5);
  assert.deepEqual(texts(commands), ["5x5 • 3 pairs  —  ESC to menu"]);

  const lines = commands.filter((c) => c.kind === "line");
  assert.equal(lines.length, 12);
  assert.deepEqual(lines[0], {
    kind: "line",
    x0: 60,
    y0: 60,
    x1: 660,
    y1: 60,
    width: 2,
    color: "#ffffff",
  });

  const circles = commands.flatMap((c) => (c.kind === "fillCircle" ? [c] : []));
  assert.equal(circles.length, 6);
  assert.deepEqual(circles[0], { kind: "fillCircle", cx: 120, cy: 120, radius: 38, color: "#f44336" });
  assert.deepEqual(circles[1], { kind: "fillCircle", cx: 600, cy: 600, radius: 38, color: "#f44336" });
  assert.equal(circles[5]?.color, pairColor(2));
  assert.equal(circles[5]?.cx, 480);
});
