import type { Point, RasterTransform } from "@flowpair/core";

/**
 * Mapping between the square logical frame and a terminal drawn with
 * half-block cells (one column × two pixel rows per cell).
 */
export type Viewport = Readonly<{
  cols: number;
  rows: number;
  /** Framebuffer size in half-block pixels. */
  widthPx: number;
  heightPx: number;
  /** Edge of the centred square, in pixels. */
  sidePx: number;
  transform: RasterTransform;
}>;

function toPositiveIntOr(v: number, fallback: number): number {
  if (!Number.isFinite(v) || v <= 0) return fallback;
  return Math.floor(v);
}

export function computeViewport(cols: number, rows: number, logicalSize: number): Viewport {
  const safeCols = toPositiveIntOr(cols, 80);
  const safeRows = toPositiveIntOr(rows, 24);
  const widthPx = safeCols;
  const heightPx = safeRows * 2;
  const sidePx = Math.min(widthPx, heightPx);
  return Object.freeze({
    cols: safeCols,
    rows: safeRows,
    widthPx,
    heightPx,
    sidePx,
    transform: Object.freeze({
      scale: sidePx / toPositiveIntOr(logicalSize, 1),
      offsetX: Math.floor((widthPx - sidePx) / 2),
      offsetY: Math.floor((heightPx - sidePx) / 2),
    }),
  });
}

/** Centre of a 1-based terminal cell, in logical pixels. */
export function cellToLogical(vp: Viewport, col: number, row: number): Point {
  const { scale, offsetX, offsetY } = vp.transform;
  const pxX = col - 1 + 0.5;
  const pxY = (row - 1) * 2 + 1;
  return { x: (pxX - offsetX) / scale, y: (pxY - offsetY) / scale };
}
