import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_ENDPOINT_TRIALS, FlowError } from "@flowpair/core";
import { GRID_SIZE } from "./helpers/layout.js";
import { PRODUCT_NAME } from "./theme.js";

export type FlowConfig = Readonly<{
  fpsCap: number;
  gridSize: number;
  trials: number;
  title: string;
  debug: Readonly<{ enabled: boolean; logPath: string }>;
}>;

export type FlowEnv = Readonly<Record<string, string | undefined>>;

export const DEFAULT_FPS_CAP = 60;
const MAX_FPS_CAP = 240;
const DEFAULT_DEBUG_LOG = "flowpair-debug.log";

function parseFpsCap(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_FPS_CAP;
  const text = raw.trim();
  const value = /^\d+$/.test(text) ? Number.parseInt(text, 10) : Number.NaN;
  if (!Number.isInteger(value) || value < 1 || value > MAX_FPS_CAP) {
    throw new FlowError(
      "FLOW_INVALID_CONFIG",
      `FLOWPAIR_FPS_CAP must be an integer between 1 and ${String(MAX_FPS_CAP)} (got ${JSON.stringify(raw)})`,
    );
  }
  return value;
}

export function resolveFlowConfig(env: FlowEnv): FlowConfig {
  const logPath = env.FLOWPAIR_DEBUG_LOG?.trim();
  return Object.freeze({
    fpsCap: parseFpsCap(env.FLOWPAIR_FPS_CAP),
    gridSize: GRID_SIZE,
    trials: DEFAULT_ENDPOINT_TRIALS,
    title: PRODUCT_NAME,
    debug: Object.freeze({
      enabled: env.FLOWPAIR_DEBUG === "1",
      logPath: logPath ? logPath : join(tmpdir(), DEFAULT_DEBUG_LOG),
    }),
  });
}
