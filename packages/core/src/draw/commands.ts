/**
 * Draw commands for a frame.
 *
 * Scene code describes a frame as a flat list of commands in logical pixels;
 * the surface decides how to rasterize them and which concrete font backs
 * each font role.
 */

/** `#rrggbb` or `#rgb`. */
export type Color = string;

/** Font roles. Surfaces own the concrete fonts. */
export type FontRole = "body" | "title";

export type DrawCommand =
  | Readonly<{ kind: "clear"; color: Color }>
  | Readonly<{
      kind: "fillRoundedRect";
      x: number;
      y: number;
      w: number;
      h: number;
      radius: number;
      color: Color;
    }>
  | Readonly<{
      kind: "strokeRoundedRect";
      x: number;
      y: number;
      w: number;
      h: number;
      radius: number;
      width: number;
      color: Color;
    }>
  | Readonly<{
      kind: "line";
      x0: number;
      y0: number;
      x1: number;
      y1: number;
      width: number;
      color: Color;
    }>
  | Readonly<{ kind: "fillCircle"; cx: number; cy: number; radius: number; color: Color }>
  | Readonly<{
      kind: "text";
      text: string;
      /** Horizontal centre. */
      x: number;
      /** Vertical centre. */
      y: number;
      color: Color;
      font: FontRole;
    }>;

export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/**
 * Command list builder.
 *
 * @example
 * ```ts
 * const g = createDrawList();
 * g.clear("#000000");
 * g.text("Hello", 360, 100, "#ffffff", "title");
 * surface.present(g.build());
 * ```
 */
export interface DrawList {
  clear(color: Color): void;
  fillRoundedRect(rect: Rect, radius: number, color: Color): void;
  strokeRoundedRect(rect: Rect, radius: number, width: number, color: Color): void;
  line(x0: number, y0: number, x1: number, y1: number, width: number, color: Color): void;
  fillCircle(cx: number, cy: number, radius: number, color: Color): void;
  text(text: string, x: number, y: number, color: Color, font?: FontRole): void;
  build(): readonly DrawCommand[];
}

export function createDrawList(): DrawList {
  const commands: DrawCommand[] = [];
  return {
    clear(color) {
      commands.push({ kind: "clear", color });
    },
    fillRoundedRect(rect, radius, color) {
      commands.push({ kind: "fillRoundedRect", ...rect, radius, color });
    },
    strokeRoundedRect(rect, radius, width, color) {
      commands.push({ kind: "strokeRoundedRect", ...rect, radius, width, color });
    },
    line(x0, y0, x1, y1, width, color) {
      commands.push({ kind: "line", x0, y0, x1, y1, width, color });
    },
    fillCircle(cx, cy, radius, color) {
      commands.push({ kind: "fillCircle", cx, cy, radius, color });
    },
    text(text, x, y, color, font = "body") {
      commands.push({ kind: "text", text, x, y, color, font });
    },
    build() {
      return Object.freeze(commands.slice());
    },
  };
}

export function rectContains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.w && y >= rect.y && y < rect.y + rect.h;
}

export function rectCenter(rect: Rect): Readonly<{ x: number; y: number }> {
  return { x: rect.x + Math.floor(rect.w / 2), y: rect.y + Math.floor(rect.h / 2) };
}
