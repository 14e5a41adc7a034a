import type { DrawCommand } from "./draw/commands.js";

/** Logical frame edge, in pixels. Surfaces scale it to whatever they render on. */
export const LOGICAL_FRAME_SIZE = 720;

export type Point = Readonly<{ x: number; y: number }>;

export type FrameSize = Readonly<{ width: number; height: number }>;

/**
 * Input delivered by a surface.
 *
 * Keys use keybinding names: "enter", "escape", "up", "down", "q", "3", ...
 * Mouse events are button presses; `button` 0 is the primary button and the
 * position is in logical pixels.
 */
export type InputEvent =
  | Readonly<{ kind: "quit" }>
  | Readonly<{ kind: "key"; key: string }>
  | Readonly<{ kind: "mouse"; button: number; x: number; y: number }>;

/**
 * Frame presentation plus input queue.
 *
 * Fonts and any other rendering resources belong to the surface; commands
 * only refer to font roles.
 */
export interface RenderSurface {
  readonly size: FrameSize;
  /** Current cursor position in logical pixels, or null when unknown. */
  pointer(): Point | null;
  /** Drain queued input. */
  pollEvents(): readonly InputEvent[];
  present(commands: readonly DrawCommand[]): void;
  dispose(): Promise<void>;
}
