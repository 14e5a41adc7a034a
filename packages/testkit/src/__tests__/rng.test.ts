import { assert, test } from "../nodeTest.js";
import { createRng } from "../rng.js";

test("createRng yields the same sequence for the same seed", () => {
  const a = createRng(42);
  const b = createRng(42);
  for (let i = 0; i < 32; i++) {
    assert.equal(a(), b());
  }
});

test("createRng diverges for different seeds", () => {
  const a = createRng(1);
  const b = createRng(2);
  const seqA = Array.from({ length: 8 }, () => a());
  const seqB = Array.from({ length: 8 }, () => b());
  assert.notDeepEqual(seqA, seqB);
});

test("createRng stays inside [0, 1)", () => {
  const rng = createRng(7);
  for (let i = 0; i < 1000; i++) {
    const v = rng();
    assert.ok(v >= 0 && v < 1, `out of range: ${String(v)}`);
  }
});
