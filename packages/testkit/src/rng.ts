/**
 * Seeded random source for tests.
 *
 * mulberry32: 32-bit state, values in [0, 1). Two generators built from the
 * same seed yield the same sequence, which keeps sampling tests reproducible.
 */
// Same shape as `Rng` in @flowpair/core; the testkit takes no workspace dependencies.
export type Rng = () => number;

export function createRng(seed: number): Rng {
  let state = Math.trunc(seed) >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}
