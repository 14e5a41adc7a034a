/**
 * packages/core/src/draw/raster.ts — RGBA framebuffer rasterizer.
 *
 * Paints DrawCommand lists into a pixel buffer through a logical→pixel
 * transform. Text is not rasterized: it comes back as overlays positioned in
 * buffer pixels so the surface can render it with its own fonts.
 */

import type { Color, DrawCommand, FontRole } from "./commands.js";

export type Pixel = Readonly<{ r: number; g: number; b: number; a: number }>;

export type FrameBuffer = Readonly<{
  widthPx: number;
  heightPx: number;
  rgba: Uint8Array;
}>;

/** Logical coordinate v maps to `offset + v * scale` buffer pixels. */
export type RasterTransform = Readonly<{
  scale: number;
  offsetX: number;
  offsetY: number;
}>;

export type TextOverlay = Readonly<{
  text: string;
  x: number;
  y: number;
  color: Color;
  font: FontRole;
}>;

const TAU = Math.PI * 2;
const FALLBACK_PIXEL: Pixel = Object.freeze({ r: 255, g: 255, b: 255, a: 255 });

export const IDENTITY_TRANSFORM: RasterTransform = Object.freeze({
  scale: 1,
  offsetX: 0,
  offsetY: 0,
});

function toI32(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return Math.trunc(v);
}

function clampInt(v: number, min: number, max: number): number {
  if (!Number.isFinite(v)) return min;
  const n = Math.trunc(v);
  if (n <= min) return min;
  if (n >= max) return max;
  return n;
}

export function parseHexColor(input: Color): Pixel | null {
  const raw = input.startsWith("#") ? input.slice(1) : input;
  if (/^[0-9a-fA-F]{6}$/.test(raw)) {
    const v = Number.parseInt(raw, 16);
    return Object.freeze({ r: (v >> 16) & 0xff, g: (v >> 8) & 0xff, b: v & 0xff, a: 255 });
  }
  if (/^[0-9a-fA-F]{3}$/.test(raw)) {
    const r = Number.parseInt(raw[0] ?? "0", 16);
    const g = Number.parseInt(raw[1] ?? "0", 16);
    const b = Number.parseInt(raw[2] ?? "0", 16);
    return Object.freeze({ r: (r << 4) | r, g: (g << 4) | g, b: (b << 4) | b, a: 255 });
  }
  return null;
}

function resolvePixel(color: Color): Pixel {
  return parseHexColor(color) ?? FALLBACK_PIXEL;
}

export function createFrameBuffer(widthPx: number, heightPx: number): FrameBuffer {
  const w = Math.max(0, toI32(widthPx));
  const h = Math.max(0, toI32(heightPx));
  return { widthPx: w, heightPx: h, rgba: new Uint8Array(w * h * 4) };
}

export function readPixel(fb: FrameBuffer, x: number, y: number): Pixel | null {
  if (x < 0 || y < 0 || x >= fb.widthPx || y >= fb.heightPx) return null;
  const off = (y * fb.widthPx + x) * 4;
  return {
    r: fb.rgba[off] ?? 0,
    g: fb.rgba[off + 1] ?? 0,
    b: fb.rgba[off + 2] ?? 0,
    a: fb.rgba[off + 3] ?? 0,
  };
}

function writePixel(fb: FrameBuffer, x: number, y: number, pixel: Pixel): void {
  if (x < 0 || y < 0 || x >= fb.widthPx || y >= fb.heightPx) return;
  const off = (y * fb.widthPx + x) * 4;
  fb.rgba[off] = pixel.r;
  fb.rgba[off + 1] = pixel.g;
  fb.rgba[off + 2] = pixel.b;
  fb.rgba[off + 3] = pixel.a;
}

function drawLine(
  fb: FrameBuffer,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  pixel: Pixel,
): void {
  let xStart = toI32(x0);
  let yStart = toI32(y0);
  const xEnd = toI32(x1);
  const yEnd = toI32(y1);
  const dx = Math.abs(xEnd - xStart);
  const sx = xStart < xEnd ? 1 : -1;
  const dy = -Math.abs(yEnd - yStart);
  const sy = yStart < yEnd ? 1 : -1;
  let err = dx + dy;
  for (;;) {
    writePixel(fb, xStart, yStart, pixel);
    if (xStart === xEnd && yStart === yEnd) break;
    const e2 = err * 2;
    if (e2 >= dy) {
      err += dy;
      xStart += sx;
    }
    if (e2 <= dx) {
      err += dx;
      yStart += sy;
    }
  }
}

/** Parallel Bresenham lines, offset along the minor axis. */
function drawThickLine(
  fb: FrameBuffer,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  thickness: number,
  pixel: Pixel,
): void {
  const t = Math.max(1, toI32(thickness));
  const mostlyHorizontal = Math.abs(x1 - x0) >= Math.abs(y1 - y0);
  const first = -Math.floor((t - 1) / 2);
  for (let k = first; k < first + t; k++) {
    if (mostlyHorizontal) {
      drawLine(fb, x0, y0 + k, x1, y1 + k, pixel);
    } else {
      drawLine(fb, x0 + k, y0, x1 + k, y1, pixel);
    }
  }
}

function fillRect(
  fb: FrameBuffer,
  x: number,
  y: number,
  w: number,
  h: number,
  pixel: Pixel,
): void {
  const x0 = Math.max(0, toI32(x));
  const y0 = Math.max(0, toI32(y));
  const x1 = Math.min(fb.widthPx, toI32(x + w));
  const y1 = Math.min(fb.heightPx, toI32(y + h));
  if (x1 <= x0 || y1 <= y0) return;
  for (let row = y0; row < y1; row++) {
    for (let col = x0; col < x1; col++) {
      writePixel(fb, col, row, pixel);
    }
  }
}

function strokeRect(
  fb: FrameBuffer,
  x: number,
  y: number,
  w: number,
  h: number,
  pixel: Pixel,
): void {
  const x0 = toI32(x);
  const y0 = toI32(y);
  const x1 = toI32(x + w - 1);
  const y1 = toI32(y + h - 1);
  if (x1 < x0 || y1 < y0) return;
  drawLine(fb, x0, y0, x1, y0, pixel);
  drawLine(fb, x0, y1, x1, y1, pixel);
  drawLine(fb, x0, y0, x0, y1, pixel);
  drawLine(fb, x1, y0, x1, y1, pixel);
}

function drawArcOutline(
  fb: FrameBuffer,
  cx: number,
  cy: number,
  radius: number,
  startAngle: number,
  endAngle: number,
  pixel: Pixel,
): void {
  const centerX = toI32(cx);
  const centerY = toI32(cy);
  const r = Math.max(0, toI32(radius));
  if (r === 0) {
    writePixel(fb, centerX, centerY, pixel);
    return;
  }
  const sweep = Math.min(TAU, endAngle - startAngle);
  if (!(sweep > 0)) return;

  const steps = Math.max(1, Math.ceil(sweep * Math.max(1, r * 2)));
  let prevX = toI32(centerX + Math.cos(startAngle) * r);
  let prevY = toI32(centerY + Math.sin(startAngle) * r);
  for (let step = 1; step <= steps; step++) {
    const t = startAngle + (sweep * step) / steps;
    const nextX = toI32(centerX + Math.cos(t) * r);
    const nextY = toI32(centerY + Math.sin(t) * r);
    drawLine(fb, prevX, prevY, nextX, nextY, pixel);
    prevX = nextX;
    prevY = nextY;
  }
}

function strokeRoundedRect(
  fb: FrameBuffer,
  x: number,
  y: number,
  w: number,
  h: number,
  radius: number,
  pixel: Pixel,
): void {
  const left = toI32(x);
  const top = toI32(y);
  const right = toI32(x + w - 1);
  const bottom = toI32(y + h - 1);
  if (right < left || bottom < top) return;

  const rectWidth = right - left + 1;
  const rectHeight = bottom - top + 1;
  const maxRadius = Math.floor(Math.min(rectWidth, rectHeight) / 2);
  const r = clampInt(radius, 0, Math.max(0, maxRadius));
  if (r === 0) {
    strokeRect(fb, left, top, rectWidth, rectHeight, pixel);
    return;
  }

  drawLine(fb, left + r, top, right - r, top, pixel);
  drawLine(fb, left + r, bottom, right - r, bottom, pixel);
  drawLine(fb, left, top + r, left, bottom - r, pixel);
  drawLine(fb, right, top + r, right, bottom - r, pixel);

  drawArcOutline(fb, left + r, top + r, r, Math.PI, Math.PI * 1.5, pixel);
  drawArcOutline(fb, right - r, top + r, r, Math.PI * 1.5, TAU, pixel);
  drawArcOutline(fb, right - r, bottom - r, r, 0, Math.PI * 0.5, pixel);
  drawArcOutline(fb, left + r, bottom - r, r, Math.PI * 0.5, Math.PI, pixel);
}

function fillRoundedRect(
  fb: FrameBuffer,
  x: number,
  y: number,
  w: number,
  h: number,
  radius: number,
  pixel: Pixel,
): void {
  const left = toI32(x);
  const top = toI32(y);
  const width = toI32(w);
  const height = toI32(h);
  if (width <= 0 || height <= 0) return;
  const r = clampInt(radius, 0, Math.floor(Math.min(width, height) / 2));
  if (r === 0) {
    fillRect(fb, left, top, width, height, pixel);
    return;
  }

  const rr = r * r;
  for (let row = 0; row < height; row++) {
    let inset = 0;
    const dy = row < r ? r - row : row >= height - r ? row - (height - r - 1) : 0;
    if (dy > 0) {
      inset = r - Math.floor(Math.sqrt(Math.max(0, rr - dy * dy)));
    }
    fillRect(fb, left + inset, top + row, width - inset * 2, 1, pixel);
  }
}

function drawCircleFill(fb: FrameBuffer, cx: number, cy: number, radius: number, pixel: Pixel): void {
  const centerX = toI32(cx);
  const centerY = toI32(cy);
  const r = Math.max(0, toI32(radius));
  const rr = r * r;
  for (let dy = -r; dy <= r; dy++) {
    const y = centerY + dy;
    if (y < 0 || y >= fb.heightPx) continue;
    const dx = Math.floor(Math.sqrt(Math.max(0, rr - dy * dy)));
    for (let x = centerX - dx; x <= centerX + dx; x++) {
      writePixel(fb, x, y, pixel);
    }
  }
}

function px(v: number, offset: number, scale: number): number {
  return Math.floor(offset + v * scale);
}

function scaledLength(v: number, scale: number): number {
  return Math.max(1, Math.round(v * scale));
}

/**
 * Paint commands in order and return the text overlays, in order, positioned
 * in buffer pixels.
 */
export function paintCommands(
  fb: FrameBuffer,
  commands: readonly DrawCommand[],
  transform: RasterTransform = IDENTITY_TRANSFORM,
): readonly TextOverlay[] {
  const { scale, offsetX, offsetY } = transform;
  const overlays: TextOverlay[] = [];

  for (const cmd of commands) {
    switch (cmd.kind) {
      case "clear": {
        fillRect(fb, 0, 0, fb.widthPx, fb.heightPx, resolvePixel(cmd.color));
        overlays.length = 0;
        break;
      }
      case "fillRoundedRect": {
        const x0 = px(cmd.x, offsetX, scale);
        const y0 = px(cmd.y, offsetY, scale);
        const x1 = px(cmd.x + cmd.w, offsetX, scale);
        const y1 = px(cmd.y + cmd.h, offsetY, scale);
        const r = Math.round(cmd.radius * scale);
        fillRoundedRect(fb, x0, y0, x1 - x0, y1 - y0, r, resolvePixel(cmd.color));
        break;
      }
      case "strokeRoundedRect": {
        const x0 = px(cmd.x, offsetX, scale);
        const y0 = px(cmd.y, offsetY, scale);
        const w = px(cmd.x + cmd.w, offsetX, scale) - x0;
        const h = px(cmd.y + cmd.h, offsetY, scale) - y0;
        const r = Math.round(cmd.radius * scale);
        const width = scaledLength(cmd.width, scale);
        const pixel = resolvePixel(cmd.color);
        for (let i = 0; i < width; i++) {
          strokeRoundedRect(fb, x0 + i, y0 + i, w - 2 * i, h - 2 * i, r - i, pixel);
        }
        break;
      }
      case "line": {
        drawThickLine(
          fb,
          px(cmd.x0, offsetX, scale),
          px(cmd.y0, offsetY, scale),
          px(cmd.x1, offsetX, scale),
          px(cmd.y1, offsetY, scale),
          scaledLength(cmd.width, scale),
          resolvePixel(cmd.color),
        );
        break;
      }
      case "fillCircle": {
        drawCircleFill(
          fb,
          px(cmd.cx, offsetX, scale),
          px(cmd.cy, offsetY, scale),
          Math.round(cmd.radius * scale),
          resolvePixel(cmd.color),
        );
        break;
      }
      case "text": {
        overlays.push({
          text: cmd.text,
          x: px(cmd.x, offsetX, scale),
          y: px(cmd.y, offsetY, scale),
          color: cmd.color,
          font: cmd.font,
        });
        break;
      }
    }
  }

  return overlays;
}
