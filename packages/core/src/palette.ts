import type { Color } from "./draw/commands.js";

/** Pair colours, in pair order. Pairs past the end wrap around. */
export const PALETTE: readonly Color[] = Object.freeze([
  "#f44336", // red
  "#4caf50", // green
  "#2196f3", // blue
  "#ffc107", // amber
  "#9c27b0", // purple
  "#ff5722", // deep orange
  "#00bcd4", // cyan
]);

export function pairColor(pairIndex: number): Color {
  const n = PALETTE.length;
  const index = ((Math.trunc(pairIndex) % n) + n) % n;
  return PALETTE[index] ?? "#ffffff";
}
