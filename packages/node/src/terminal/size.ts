import terminalSize from "terminal-size";

export type TerminalSize = Readonly<{ columns: number; rows: number }>;

type SizedStream = Readonly<{ columns?: unknown; rows?: unknown }>;

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

/** Stream dimensions first, then the terminal-size probe, then 80×24. */
export function readTerminalSize(stdout: SizedStream): TerminalSize {
  const columns = toPositiveIntOr(stdout.columns, 0);
  const rows = toPositiveIntOr(stdout.rows, 0);
  if (columns > 0 && rows > 0) return { columns, rows };
  try {
    const probed = terminalSize();
    return {
      columns: columns > 0 ? columns : toPositiveIntOr(probed.columns, 80),
      rows: rows > 0 ? rows : toPositiveIntOr(probed.rows, 24),
    };
  } catch {
    return { columns: columns > 0 ? columns : 80, rows: rows > 0 ? rows : 24 };
  }
}
