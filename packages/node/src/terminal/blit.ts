/**
 * packages/node/src/terminal/blit.ts — Framebuffer → half-block ANSI output.
 *
 * Each terminal cell shows two stacked pixels as "▀": foreground is the top
 * pixel, background the bottom one. Text overlays replace whole cells and
 * keep the pixel under them as background. Styles are only re-emitted when
 * they change between neighbouring cells.
 */

import {
  type FontRole,
  type FrameBuffer,
  type Pixel,
  type TextOverlay,
  parseHexColor,
  readPixel,
} from "@flowpair/core";
import { RESET_STYLE, bgColor, bold, fgColor, moveTo } from "./ansi.js";
import type { Viewport } from "./viewport.js";

export const HALF_BLOCK = "▀";

export type TerminalFont = Readonly<{ bold: boolean }>;

/** Concrete fonts behind each font role. */
export type TerminalFonts = Readonly<Record<FontRole, TerminalFont>>;

export const DEFAULT_TERMINAL_FONTS: TerminalFonts = Object.freeze({
  body: Object.freeze({ bold: false }),
  title: Object.freeze({ bold: true }),
});

export type StyledCell = Readonly<{
  ch: string;
  fg: Pixel;
  bg: Pixel;
  bold: boolean;
}>;

const BLACK: Pixel = Object.freeze({ r: 0, g: 0, b: 0, a: 255 });
const WHITE: Pixel = Object.freeze({ r: 255, g: 255, b: 255, a: 255 });

function opaque(p: Pixel | null): Pixel {
  if (!p || p.a === 0) return BLACK;
  return p;
}

function samePixel(a: Pixel, b: Pixel): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

export function composeCells(
  fb: FrameBuffer,
  overlays: readonly TextOverlay[],
  vp: Viewport,
  fonts: TerminalFonts = DEFAULT_TERMINAL_FONTS,
): StyledCell[][] {
  const grid: StyledCell[][] = [];
  for (let row = 0; row < vp.rows; row++) {
    const line: StyledCell[] = [];
    for (let col = 0; col < vp.cols; col++) {
      line.push({
        ch: HALF_BLOCK,
        fg: opaque(readPixel(fb, col, row * 2)),
        bg: opaque(readPixel(fb, col, row * 2 + 1)),
        bold: false,
      });
    }
    grid.push(line);
  }

  for (const overlay of overlays) {
    const line = grid[Math.floor(overlay.y / 2)];
    if (!line) continue;
    const chars = Array.from(overlay.text);
    const start = overlay.x - Math.floor(chars.length / 2);
    const fg = parseHexColor(overlay.color) ?? WHITE;
    const font = fonts[overlay.font];
    for (let k = 0; k < chars.length; k++) {
      const col = start + k;
      const ch = chars[k];
      if (ch === undefined || col < 0 || col >= line.length) continue;
      line[col] = { ch, fg, bg: opaque(readPixel(fb, col, overlay.y)), bold: font.bold };
    }
  }

  return grid;
}

export function serializeCells(grid: readonly (readonly StyledCell[])[]): string {
  let out = "";
  let prev: StyledCell | null = null;
  for (let row = 0; row < grid.length; row++) {
    const line = grid[row];
    if (!line) continue;
    out += moveTo(row + 1, 1);
    for (const cell of line) {
      if (!prev || !samePixel(prev.fg, cell.fg)) out += fgColor(cell.fg);
      if (!prev || !samePixel(prev.bg, cell.bg)) out += bgColor(cell.bg);
      if (!prev || prev.bold !== cell.bold) out += bold(cell.bold);
      out += cell.ch;
      prev = cell;
    }
  }
  return out + RESET_STYLE;
}

export function blitFrame(
  fb: FrameBuffer,
  overlays: readonly TextOverlay[],
  vp: Viewport,
  fonts: TerminalFonts = DEFAULT_TERMINAL_FONTS,
): string {
  return serializeCells(composeCells(fb, overlays, vp, fonts));
}
