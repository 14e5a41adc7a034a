import { appendFileSync } from "node:fs";
import type { DebugRecord, DebugSink } from "@flowpair/core";

/** Appends one JSON object per record to `logPath`. */
export function createJsonLinesSink(
  logPath: string,
  now: () => Date = () => new Date(),
): DebugSink {
  return (record: DebugRecord) => {
    appendFileSync(
      logPath,
      `${JSON.stringify({
        ts: now().toISOString(),
        ...record,
      })}\n`,
    );
  };
}
