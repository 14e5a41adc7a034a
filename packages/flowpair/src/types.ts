import type { DebugTrace, EndpointPair, Rng } from "@flowpair/core";

export type SceneName = "menu" | "config" | "run";

export type PairCount = 3 | 4 | 5;

export type FlowState = Readonly<{
  running: boolean;
  scene: SceneName;
  numPairs: PairCount;
  endpoints: readonly EndpointPair[];
  /** Arrow-key focus in the menu; null until an arrow is pressed. */
  menuFocus: number | null;
}>;

export type FlowAction =
  | Readonly<{ type: "quit" }>
  | Readonly<{ type: "open-menu" }>
  | Readonly<{ type: "open-config" }>
  | Readonly<{ type: "open-run"; endpoints: readonly EndpointPair[] }>
  | Readonly<{ type: "set-pairs"; numPairs: PairCount }>
  | Readonly<{ type: "focus-menu"; index: number | null }>;

export type MenuControl = "run" | "config" | "quit";

/** Per-process dependencies of the scene step. */
export type SceneEnv = Readonly<{
  rng: Rng;
  gridSize: number;
  trials: number;
  trace: DebugTrace;
}>;
