/**
 * packages/core/src/debug/trace.ts — In-memory debug trace.
 *
 * Records land in a bounded ring; records at or above `minSinkSeverity` are
 * also forwarded to the sink (a JSON-lines file in the application).
 */

export type DebugCategory = "frame" | "event" | "state" | "generator" | "error";

/**
 * Severity levels (low to high):
 *   - trace: per-frame detail, ring only by default
 *   - info: lifecycle and transitions
 *   - warn: recoverable oddities
 *   - error: fatal failures
 */
export type DebugSeverity = "trace" | "info" | "warn" | "error";

export type DebugRecord = Readonly<{
  seq: number;
  frameId: number;
  category: DebugCategory;
  severity: DebugSeverity;
  message: string;
  data?: Readonly<Record<string, unknown>>;
}>;

export type DebugSink = (record: DebugRecord) => void;

export type DebugTraceOptions = Readonly<{
  capacity?: number;
  sink?: DebugSink;
  minSinkSeverity?: DebugSeverity;
}>;

export interface DebugTrace {
  record(
    category: DebugCategory,
    severity: DebugSeverity,
    message: string,
    data?: Readonly<Record<string, unknown>>,
  ): void;
  /** Frame id stamped on subsequent records. */
  setFrame(frameId: number): void;
  /** Oldest first. */
  records(): readonly DebugRecord[];
}

const DEFAULT_CAPACITY = 256;

const SEVERITY_RANK: Readonly<Record<DebugSeverity, number>> = Object.freeze({
  trace: 0,
  info: 1,
  warn: 2,
  error: 3,
});

export function severityAtLeast(severity: DebugSeverity, min: DebugSeverity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[min];
}

export function createDebugTrace(opts: DebugTraceOptions = {}): DebugTrace {
  const capacity =
    opts.capacity !== undefined && Number.isInteger(opts.capacity) && opts.capacity > 0
      ? opts.capacity
      : DEFAULT_CAPACITY;
  const minSinkSeverity = opts.minSinkSeverity ?? "info";
  const ring: DebugRecord[] = [];
  let seq = 0;
  let frameId = 0;

  return {
    record(category, severity, message, data) {
      seq++;
      const rec: DebugRecord = Object.freeze(
        data === undefined
          ? { seq, frameId, category, severity, message }
          : { seq, frameId, category, severity, message, data },
      );
      ring.push(rec);
      if (ring.length > capacity) {
        ring.splice(0, ring.length - capacity);
      }
      if (opts.sink && severityAtLeast(severity, minSinkSeverity)) {
        opts.sink(rec);
      }
    },
    setFrame(next) {
      frameId = next;
    },
    records() {
      return Object.freeze(ring.slice());
    },
  };
}

/** Trace that records nothing. */
export const NOOP_TRACE: DebugTrace = Object.freeze({
  record: () => {},
  setFrame: () => {},
  records: () => Object.freeze([]),
});
