import assert from "node:assert/strict";
import test from "node:test";
import {
  type Cell,
  type FrameInput,
  type InputEvent,
  type Point,
  cellKey,
  createDebugTrace,
  flattenPairs,
} from "@flowpair/core";
import { createRng } from "@flowpair/testkit";
import { createInitialState, reduceFlowState } from "../helpers/state.js";
import { stepScene } from "../screens/index.js";
import type { FlowState, SceneEnv } from "../types.js";

const RUN_CENTER: Point = { x: 360, y: 310 };
const CONFIG_CENTER: Point = { x: 360, y: 390 };
const QUIT_CENTER: Point = { x: 360, y: 470 };

function createEnv(seed = 7): SceneEnv {
  return { rng: createRng(seed), gridSize: 5, trials: 1000, trace: createDebugTrace() };
}

function frame(events: readonly InputEvent[], pointer: Point | null = null): FrameInput {
  return { frameId: 1, pointer, events };
}

function key(k: string): InputEvent {
  return { kind: "key", key: k };
}

function click(at: Point, button = 0): InputEvent {
  return { kind: "mouse", button, x: at.x, y: at.y };
}

function step(
  state: FlowState,
  events: readonly InputEvent[],
  env = createEnv(),
  pointer: Point | null = null,
): FlowState {
  return stepScene(state, frame(events, pointer), env).state;
}

function inBounds(c: Cell): boolean {
  return c.row >= 0 && c.row < 5 && c.col >= 0 && c.col < 5;
}

test("enter with nothing hovered starts a run", () => {
  const next = step(createInitialState(), [key("enter")]);
  assert.equal(next.scene, "run");
  assert.equal(next.endpoints.length, 3);
  const cells = flattenPairs(next.endpoints);
  assert.equal(new Set(cells.map(cellKey)).size, 6);
  assert.equal(cells.every(inBounds), true);
});

test("run generates as many pairs as configured", () => {
  for (const numPairs of [3, 4, 5] as const) {
    const state = reduceFlowState(createInitialState(), { type: "set-pairs", numPairs });
    const next = step(state, [click(RUN_CENTER)]);
    assert.equal(next.scene, "run");
    assert.equal(next.endpoints.length, numPairs);
    assert.equal(new Set(flattenPairs(next.endpoints).map(cellKey)).size, numPairs * 2);
  }
});

test("same seed gives the same endpoints", () => {
  const a = step(createInitialState(), [key("enter")], createEnv(42));
  const b = step(createInitialState(), [key("enter")], createEnv(42));
  assert.deepEqual(a.endpoints, b.endpoints);
});

test("enter picks the hovered control", () => {
  const next = step(createInitialState(), [key("enter")], createEnv(), CONFIG_CENTER);
  assert.equal(next.scene, "config");
  assert.deepEqual(next.endpoints, []);
});

test("enter falls back to arrow focus", () => {
  const viaDown = step(createInitialState(), [key("down"), key("down"), key("enter")]);
  assert.equal(viaDown.menuFocus, 1);
  assert.equal(viaDown.scene, "config");

  const viaUp = step(createInitialState(), [key("up"), key("enter")]);
  assert.equal(viaUp.menuFocus, 2);
  assert.equal(viaUp.running, false);
});

test("arrow focus wraps around", () => {
  const focused = reduceFlowState(createInitialState(), { type: "focus-menu", index: 2 });
  assert.equal(step(focused, [key("down")]).menuFocus, 0);
  const top = reduceFlowState(focused, { type: "focus-menu", index: 0 });
  assert.equal(step(top, [key("up")]).menuFocus, 2);
});

test("clicks are hit-tested where they happened", () => {
  const next = step(createInitialState(), [click(QUIT_CENTER)], createEnv(), RUN_CENTER);
  assert.equal(next.running, false);
  assert.equal(next.scene, "menu");
});

test("secondary clicks and clicks between buttons do nothing", () => {
  const initial = createInitialState();
  assert.deepEqual(step(initial, [click(RUN_CENTER, 2)]), initial);
  assert.deepEqual(step(initial, [click({ x: 360, y: 350 })]), initial);
});

test("the last selection in a tick wins", () => {
  const next = step(createInitialState(), [click(RUN_CENTER), click(CONFIG_CENTER)]);
  assert.equal(next.scene, "config");
  assert.deepEqual(next.endpoints, []);
});

test("q and escape quit from the menu", () => {
  assert.equal(step(createInitialState(), [key("q")]).running, false);
  assert.equal(step(createInitialState(), [key("escape")]).running, false);
});

test("a quit signal stops every scene", () => {
  const menu = createInitialState();
  const config = reduceFlowState(menu, { type: "open-config" });
  const run = step(menu, [key("enter")]);
  for (const state of [menu, config, run]) {
    const next = step(state, [{ kind: "quit" }]);
    assert.equal(next.running, false);
    assert.equal(next.scene, state.scene);
  }
});

test("config round-trip to four pairs", () => {
  const env = createEnv();
  let state = step(createInitialState(), [click(CONFIG_CENTER)], env);
  assert.equal(state.scene, "config");
  state = step(state, [key("4")], env);
  assert.equal(state.numPairs, 4);
  state = step(state, [key("escape")], env);
  assert.equal(state.scene, "menu");
  state = step(state, [key("enter")], env);
  assert.equal(state.scene, "run");
  assert.equal(state.endpoints.length, 4);
});

test("config buttons set the pair count in event order", () => {
  const config = reduceFlowState(createInitialState(), { type: "open-config" });
  assert.equal(step(config, [click({ x: 470, y: 350 })]).numPairs, 5);
  assert.equal(step(config, [key("5"), key("3")]).numPairs, 3);
  assert.equal(step(config, [click({ x: 250, y: 350 }, 2)]).numPairs, 3);
});

test("escape from run keeps pairs and endpoints", () => {
  const env = createEnv();
  const four = reduceFlowState(createInitialState(), { type: "set-pairs", numPairs: 4 });
  const run = step(four, [key("enter")], env);
  const back = step(run, [key("escape")], env);
  assert.equal(back.scene, "menu");
  assert.equal(back.numPairs, 4);
  assert.deepEqual(back.endpoints, run.endpoints);
});

test("run ignores keys other than escape", () => {
  const run = step(createInitialState(), [key("enter")]);
  assert.deepEqual(step(run, [key("enter"), key("q")]), run);
});

test("an unknown scene falls back to the menu without drawing", () => {
  const env = createEnv();
  // Scene value outside SceneName, as from a corrupted state.
  const corrupted: FlowState = Object.assign({}, createInitialState(), { scene: "credits" });
  const out = stepScene(corrupted, frame([]), env);
  assert.equal(out.state.scene, "menu");
  assert.deepEqual(out.commands, []);
  const warn = env.trace.records().find((r) => r.severity === "warn");
  assert.equal(warn?.message, "unknown scene");
  assert.deepEqual(warn?.data, { scene: "credits" });
});

test("scene changes and generation are traced", () => {
  const env = createEnv();
  step(createInitialState(), [key("enter")], env);
  const messages = env.trace.records().map((r) => `${r.category}:${r.message}`);
  assert.deepEqual(messages, ["generator:endpoints generated", "state:scene change"]);
  const change = env.trace.records()[1];
  assert.deepEqual(change?.data, { from: "menu", to: "run" });
});

test("each tick draws from the state it started with", () => {
  const out = stepScene(createInitialState(), frame([key("enter")]), createEnv());
  assert.equal(out.state.scene, "run");
  assert.equal(
    out.commands.some((c) => c.kind === "text" && c.text === "Flow (prototype)"),
    true,
  );
});
