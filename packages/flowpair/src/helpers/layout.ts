/**
 * Fixed layout of the 720×720 logical frame.
 */

import {
  type Cell,
  LOGICAL_FRAME_SIZE,
  type Point,
  type Rect,
  rectContains,
} from "@flowpair/core";
import type { MenuControl, PairCount } from "../types.js";

export const GRID_SIZE = 5;

export const MENU_CONTROLS: readonly Readonly<{ id: MenuControl; label: string }>[] =
  Object.freeze([
    { id: "run", label: "Run" },
    { id: "config", label: "Config" },
    { id: "quit", label: "Quit" },
  ]);

export const PAIR_CHOICES: readonly PairCount[] = Object.freeze([3, 4, 5]);

const MENU_BUTTON_W = 260;
const MENU_BUTTON_H = 60;
const MENU_SPACING = 20;
const MENU_START_Y = 280;

const CONFIG_BUTTON_W = 90;
const CONFIG_BUTTON_H = 60;
const CONFIG_SPACING = 20;
const CONFIG_START_Y = 320;

const GRID_MARGIN = 60;
const ENDPOINT_RADIUS_RATIO = 0.32;

export function menuButtonRects(): readonly Rect[] {
  const x = Math.floor((LOGICAL_FRAME_SIZE - MENU_BUTTON_W) / 2);
  return Object.freeze(
    MENU_CONTROLS.map((_, i) => ({
      x,
      y: MENU_START_Y + i * (MENU_BUTTON_H + MENU_SPACING),
      w: MENU_BUTTON_W,
      h: MENU_BUTTON_H,
    })),
  );
}

export function configButtonRects(): readonly Rect[] {
  const count = PAIR_CHOICES.length;
  const totalW = count * CONFIG_BUTTON_W + (count - 1) * CONFIG_SPACING;
  const x0 = Math.floor((LOGICAL_FRAME_SIZE - totalW) / 2);
  return Object.freeze(
    PAIR_CHOICES.map((_, i) => ({
      x: x0 + i * (CONFIG_BUTTON_W + CONFIG_SPACING),
      y: CONFIG_START_Y,
      w: CONFIG_BUTTON_W,
      h: CONFIG_BUTTON_H,
    })),
  );
}

/** Index of the first rect containing `point`, or null. */
export function hitTest(rects: readonly Rect[], point: Point | null): number | null {
  if (!point) return null;
  const index = rects.findIndex((rect) => rectContains(rect, point.x, point.y));
  return index < 0 ? null : index;
}

export type GridMetrics = Readonly<{
  n: number;
  cellPx: number;
  /** Edge of the square grid. */
  sizePx: number;
  originX: number;
  originY: number;
  endpointRadius: number;
}>;

export function gridMetrics(n: number = GRID_SIZE): GridMetrics {
  const cellPx = Math.floor((LOGICAL_FRAME_SIZE - 2 * GRID_MARGIN) / n);
  const sizePx = cellPx * n;
  const origin = Math.floor((LOGICAL_FRAME_SIZE - sizePx) / 2);
  return Object.freeze({
    n,
    cellPx,
    sizePx,
    originX: origin,
    originY: origin,
    endpointRadius: Math.trunc(cellPx * ENDPOINT_RADIUS_RATIO),
  });
}

/** Centre of a cell in logical pixels. */
export function gridToPx(metrics: GridMetrics, c: Cell): Point {
  const half = Math.floor(metrics.cellPx / 2);
  return {
    x: metrics.originX + c.col * metrics.cellPx + half,
    y: metrics.originY + c.row * metrics.cellPx + half,
  };
}
