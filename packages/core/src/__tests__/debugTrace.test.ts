import { assert, test } from "@flowpair/testkit";
import { type DebugRecord, createDebugTrace, severityAtLeast } from "../debug/trace.js";

test("trace keeps only the newest records up to capacity", () => {
  const trace = createDebugTrace({ capacity: 2 });
  trace.record("state", "info", "a");
  trace.record("state", "info", "b");
  trace.record("state", "info", "c");
  assert.deepEqual(
    trace.records().map((r) => [r.seq, r.message]),
    [
      [2, "b"],
      [3, "c"],
    ],
  );
});

test("sink only receives records at or above the threshold", () => {
  const sunk: DebugRecord[] = [];
  const trace = createDebugTrace({ sink: (r) => sunk.push(r), minSinkSeverity: "warn" });
  trace.record("frame", "trace", "tick");
  trace.record("state", "info", "scene");
  trace.record("error", "error", "boom", { code: "FLOW_SURFACE_ERROR" });
  assert.equal(sunk.length, 1);
  assert.deepEqual(sunk[0], {
    seq: 3,
    frameId: 0,
    category: "error",
    severity: "error",
    message: "boom",
    data: { code: "FLOW_SURFACE_ERROR" },
  });
});

test("records carry the current frame id", () => {
  const trace = createDebugTrace();
  trace.setFrame(41);
  trace.record("event", "trace", "key");
  assert.equal(trace.records()[0]?.frameId, 41);
});

test("severityAtLeast orders severities", () => {
  assert.equal(severityAtLeast("error", "warn"), true);
  assert.equal(severityAtLeast("trace", "info"), false);
  assert.equal(severityAtLeast("info", "info"), true);
});
