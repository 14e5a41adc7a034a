import assert from "node:assert/strict";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { isFlowError } from "@flowpair/core";
import { resolveFlowConfig } from "../config.js";

test("defaults", () => {
  assert.deepEqual(resolveFlowConfig({}), {
    fpsCap: 60,
    gridSize: 5,
    trials: 1000,
    title: "Flow (prototype)",
    debug: { enabled: false, logPath: join(tmpdir(), "flowpair-debug.log") },
  });
});

test("fps cap and debug settings come from the environment", () => {
  const config = resolveFlowConfig({
    FLOWPAIR_FPS_CAP: " 30 ",
    FLOWPAIR_DEBUG: "1",
    FLOWPAIR_DEBUG_LOG: "/var/tmp/flow.log",
  });
  assert.equal(config.fpsCap, 30);
  assert.deepEqual(config.debug, { enabled: true, logPath: "/var/tmp/flow.log" });
});

test("blank values fall back to defaults", () => {
  const config = resolveFlowConfig({ FLOWPAIR_FPS_CAP: "", FLOWPAIR_DEBUG_LOG: "  " });
  assert.equal(config.fpsCap, 60);
  assert.equal(config.debug.logPath, join(tmpdir(), "flowpair-debug.log"));
});

test("debug needs exactly 1", () => {
  assert.equal(resolveFlowConfig({ FLOWPAIR_DEBUG: "true" }).debug.enabled, false);
});

test("invalid fps caps are rejected", () => {
  for (const raw of ["0", "241", "12.5", "-5", "fast"]) {
    assert.throws(
      () => resolveFlowConfig({ FLOWPAIR_FPS_CAP: raw }),
      (err: unknown) => isFlowError(err, "FLOW_INVALID_CONFIG"),
    );
  }
});

test("config is frozen", () => {
  const config = resolveFlowConfig({});
  assert.equal(Object.isFrozen(config), true);
  assert.equal(Object.isFrozen(config.debug), true);
});
