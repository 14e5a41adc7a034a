import { performance } from "node:perf_hooks";
import { setTimeout as delay } from "node:timers/promises";
import type { FrameClock } from "@flowpair/core";

export function createNodeClock(): FrameClock {
  return Object.freeze({
    now: () => performance.now(),
    sleep: async (ms: number) => {
      if (ms <= 0) return;
      await delay(ms);
    },
  });
}
