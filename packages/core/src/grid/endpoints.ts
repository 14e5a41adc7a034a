/**
 * packages/core/src/grid/endpoints.ts — Random endpoint placement.
 *
 * Samples pairings of distinct cells and keeps the one whose pairs sit
 * furthest apart (sum of Manhattan distances). The result is a heuristic:
 * nothing here checks that the layout can be connected as a flow puzzle.
 */

import { FlowError } from "../errors.js";
import { type Rng, defaultRng, randomIndex } from "../rng.js";
import { type Cell, type EndpointPair, allCells, manhattan } from "./cells.js";

export const DEFAULT_ENDPOINT_TRIALS = 1000;

export type EndpointTrialObserver = (
  pairs: readonly EndpointPair[],
  score: number,
  trialIndex: number,
) => void;

export type GenerateEndpointsOptions = Readonly<{
  rng?: Rng;
  trials?: number;
  onTrial?: EndpointTrialObserver;
}>;

export type EndpointGeneration = Readonly<{
  pairs: readonly EndpointPair[];
  score: number;
  trials: number;
}>;

function assertPositiveInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new FlowError(
      "FLOW_INVALID_ARGUMENT",
      `${name} must be a positive integer, got ${String(value)}`,
    );
  }
}

/**
 * Shuffle every cell of the grid in place (Fisher–Yates, last index down) and
 * take the first `k`. Equivalent to sampling `k` cells without replacement.
 */
export function sampleDistinctCells(k: number, n: number, rng: Rng = defaultRng): Cell[] {
  const cells = allCells(n);
  for (let i = cells.length - 1; i > 0; i--) {
    const j = randomIndex(rng, i + 1);
    const a = cells[i];
    const b = cells[j];
    if (a === undefined || b === undefined) continue;
    cells[i] = b;
    cells[j] = a;
  }
  return cells.slice(0, k);
}

/** Consecutive slots form a pair: (0,1), (2,3), ... */
export function pairCells(cells: readonly Cell[], numPairs: number): EndpointPair[] {
  const pairs: EndpointPair[] = [];
  for (let i = 0; i < numPairs; i++) {
    const a = cells[2 * i];
    const b = cells[2 * i + 1];
    if (a === undefined || b === undefined) {
      throw new FlowError(
        "FLOW_INVALID_ARGUMENT",
        `pairCells: need ${String(numPairs * 2)} cells, got ${String(cells.length)}`,
      );
    }
    pairs.push(Object.freeze([a, b] as const));
  }
  return pairs;
}

export function scorePairs(pairs: readonly EndpointPair[]): number {
  let score = 0;
  for (const [a, b] of pairs) {
    score += manhattan(a, b);
  }
  return score;
}

export function generateEndpoints(
  numPairs: number,
  n: number,
  options: GenerateEndpointsOptions = {},
): EndpointGeneration {
  assertPositiveInt(numPairs, "numPairs");
  assertPositiveInt(n, "n");
  if (2 * numPairs > n * n) {
    throw new FlowError(
      "FLOW_INVALID_ARGUMENT",
      `${String(numPairs)} pairs need ${String(2 * numPairs)} cells; a ${String(n)}x${String(n)} grid has ${String(n * n)}`,
    );
  }
  const trials = options.trials ?? DEFAULT_ENDPOINT_TRIALS;
  assertPositiveInt(trials, "trials");
  const rng = options.rng ?? defaultRng;

  let best: readonly EndpointPair[] = [];
  let bestScore = -1;
  for (let t = 0; t < trials; t++) {
    const pairs = pairCells(sampleDistinctCells(2 * numPairs, n, rng), numPairs);
    const score = scorePairs(pairs);
    options.onTrial?.(pairs, score, t);
    if (score > bestScore) {
      bestScore = score;
      best = pairs;
    }
  }

  return Object.freeze({ pairs: Object.freeze([...best]), score: bestScore, trials });
}
