import assert from "node:assert/strict";
import test from "node:test";
import { cell } from "@flowpair/core";
import { createInitialState, reduceFlowState } from "../helpers/state.js";

test("initial state opens on the menu with three pairs", () => {
  assert.deepEqual(createInitialState(), {
    running: true,
    scene: "menu",
    numPairs: 3,
    endpoints: [],
    menuFocus: null,
  });
});

test("scene actions switch scenes", () => {
  const initial = createInitialState();
  const config = reduceFlowState(initial, { type: "open-config" });
  assert.equal(config.scene, "config");
  assert.equal(reduceFlowState(config, { type: "open-menu" }).scene, "menu");
});

test("open-run stores endpoints and enters run", () => {
  const pairs = [[cell(0, 0), cell(4, 4)] as const];
  const next = reduceFlowState(createInitialState(), { type: "open-run", endpoints: pairs });
  assert.equal(next.scene, "run");
  assert.deepEqual(next.endpoints, pairs);
});

test("quit clears running and keeps the scene", () => {
  const config = reduceFlowState(createInitialState(), { type: "open-config" });
  const quit = reduceFlowState(config, { type: "quit" });
  assert.equal(quit.running, false);
  assert.equal(quit.scene, "config");
});

test("set-pairs and focus-menu update their fields only", () => {
  const initial = createInitialState();
  const five = reduceFlowState(initial, { type: "set-pairs", numPairs: 5 });
  assert.equal(five.numPairs, 5);
  assert.equal(five.scene, "menu");
  assert.equal(reduceFlowState(five, { type: "focus-menu", index: 2 }).menuFocus, 2);
});

test("reducer does not mutate its input", () => {
  const initial = createInitialState();
  reduceFlowState(initial, { type: "set-pairs", numPairs: 4 });
  assert.equal(initial.numPairs, 3);
});
