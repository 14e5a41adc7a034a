/**
 * packages/node/src/nodeSurface.ts — Terminal RenderSurface.
 *
 * Owns the terminal for the lifetime of the surface: raw-mode stdin, the
 * alternate screen, mouse tracking and the window title. Frames are
 * rasterized into a half-block framebuffer sized to the current terminal and
 * written as one ANSI string; an unchanged frame is not rewritten.
 *
 * Input is decoded as it arrives and queued until the next `pollEvents()`.
 * Pointer motion only updates `pointer()`; button presses are queued as
 * mouse events in logical pixels. Ctrl+C, SIGINT/SIGTERM and the end of stdin
 * all queue a quit event.
 *
 * A stream error (EIO, EPIPE when the terminal goes away) also queues quit;
 * the next `present()` throws FLOW_SURFACE_ERROR.
 */

import type { Readable, Writable } from "node:stream";
import {
  FlowError,
  type FrameSize,
  type InputEvent,
  LOGICAL_FRAME_SIZE,
  type Point,
  type RenderSurface,
  createFrameBuffer,
  paintCommands,
} from "@flowpair/core";
import {
  CLEAR_SCREEN,
  DISABLE_MOUSE,
  ENABLE_MOUSE,
  ENTER_ALT_SCREEN,
  EXIT_ALT_SCREEN,
  HIDE_CURSOR,
  RESET_STYLE,
  SHOW_CURSOR,
  setTitle,
} from "./terminal/ansi.js";
import { DEFAULT_TERMINAL_FONTS, type TerminalFonts, blitFrame } from "./terminal/blit.js";
import { type DecodedInput, createInputDecoder } from "./terminal/input.js";
import { type TerminalSize, readTerminalSize } from "./terminal/size.js";
import { type Viewport, cellToLogical, computeViewport } from "./terminal/viewport.js";

type SurfaceStdin = Readable &
  Readonly<{
    isTTY?: boolean;
    setRawMode?: (enabled: boolean) => unknown;
  }>;

type SurfaceStdout = Writable &
  Readonly<{
    isTTY?: boolean;
    columns?: number;
    rows?: number;
  }>;

type QuitSignal = "SIGINT" | "SIGTERM";

/** Where SIGINT/SIGTERM are listened for; `process` unless injected. */
export type SignalTarget = Readonly<{
  on(signal: QuitSignal, listener: () => void): unknown;
  off(signal: QuitSignal, listener: () => void): unknown;
}>;

export type NodeSurfaceOptions = Readonly<{
  title: string;
  stdin?: SurfaceStdin;
  stdout?: SurfaceStdout;
  fonts?: TerminalFonts;
  /** Defaults to true; in-process tests pass plain streams. */
  requireTty?: boolean;
  /** Defaults to true. */
  handleSignals?: boolean;
  signals?: SignalTarget;
  /** Terminal size probe; defaults to the stream size with a terminal-size fallback. */
  size?: () => TerminalSize;
}>;

const CONTROL_CHARS_RE = /[\x00-\x1f\x7f]/u;

function validateOptions(opts: NodeSurfaceOptions): void {
  if (typeof opts.title !== "string" || opts.title.trim().length === 0) {
    throw new FlowError("FLOW_INVALID_CONFIG", "createNodeSurface: title must be a non-empty string");
  }
  if (CONTROL_CHARS_RE.test(opts.title)) {
    throw new FlowError(
      "FLOW_INVALID_CONFIG",
      "createNodeSurface: title must not contain control characters",
    );
  }
}

function writeAndWait(stream: Writable, data: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stream.write(data, (err?: Error | null) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

export function createNodeSurface(opts: NodeSurfaceOptions): RenderSurface {
  validateOptions(opts);
  const stdin: SurfaceStdin = opts.stdin ?? process.stdin;
  const stdout: SurfaceStdout = opts.stdout ?? process.stdout;
  const requireTty = opts.requireTty ?? true;
  const handleSignals = opts.handleSignals ?? true;
  const signals: SignalTarget = opts.signals ?? process;
  const fonts = opts.fonts ?? DEFAULT_TERMINAL_FONTS;
  const probeSize = opts.size ?? (() => readTerminalSize(stdout));

  if (requireTty && (stdin.isTTY !== true || stdout.isTTY !== true)) {
    throw new FlowError("FLOW_SURFACE_ERROR", "flowpair needs an interactive terminal (TTY)");
  }

  const size: FrameSize = Object.freeze({ width: LOGICAL_FRAME_SIZE, height: LOGICAL_FRAME_SIZE });
  const decoder = createInputDecoder();
  const queue: InputEvent[] = [];
  let pointer: Point | null = null;
  let disposed = false;
  let lastFrame = "";
  let failure: Readonly<{ stream: "stdin" | "stdout"; error: Error }> | null = null;

  const initial = probeSize();
  let viewport: Viewport = computeViewport(initial.columns, initial.rows, LOGICAL_FRAME_SIZE);

  const applyDecoded = (input: DecodedInput): void => {
    if (input.kind === "mouse") {
      const at = cellToLogical(viewport, input.col, input.row);
      pointer = at;
      if (input.action === "press") {
        queue.push({ kind: "mouse", button: input.button, x: at.x, y: at.y });
      }
      return;
    }
    queue.push(input);
  };

  const onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
    for (const input of decoder.push(text)) {
      applyDecoded(input);
    }
  };
  const onQuit = (): void => {
    queue.push({ kind: "quit" });
  };
  const failWith =
    (stream: "stdin" | "stdout") =>
    (error: Error): void => {
      if (!failure) failure = { stream, error };
      queue.push({ kind: "quit" });
    };
  const onStdinError = failWith("stdin");
  const onStdoutError = failWith("stdout");

  stdin.on("data", onData);
  stdin.on("end", onQuit);
  stdin.on("error", onStdinError);
  stdout.on("error", onStdoutError);
  if (handleSignals) {
    signals.on("SIGINT", onQuit);
    signals.on("SIGTERM", onQuit);
  }
  if (typeof stdin.setRawMode === "function") {
    stdin.setRawMode(true);
  }
  stdin.resume();
  stdout.write(
    `${ENTER_ALT_SCREEN}${HIDE_CURSOR}${ENABLE_MOUSE}${setTitle(opts.title)}${CLEAR_SCREEN}`,
  );

  return {
    size,
    pointer: () => pointer,
    pollEvents() {
      return queue.splice(0, queue.length);
    },
    present(commands) {
      if (disposed) {
        throw new FlowError("FLOW_INVALID_STATE", "present() after dispose()");
      }
      if (failure) {
        throw new FlowError(
          "FLOW_SURFACE_ERROR",
          `terminal ${failure.stream} failed: ${failure.error.message}`,
        );
      }
      const current = probeSize();
      if (current.columns !== viewport.cols || current.rows !== viewport.rows) {
        viewport = computeViewport(current.columns, current.rows, LOGICAL_FRAME_SIZE);
        lastFrame = "";
      }
      const fb = createFrameBuffer(viewport.widthPx, viewport.heightPx);
      const overlays = paintCommands(fb, commands, viewport.transform);
      const frame = blitFrame(fb, overlays, viewport, fonts);
      if (frame === lastFrame) return;
      lastFrame = frame;
      stdout.write(frame);
    },
    async dispose() {
      if (disposed) return;
      disposed = true;
      stdin.off("data", onData);
      stdin.off("end", onQuit);
      if (handleSignals) {
        signals.off("SIGINT", onQuit);
        signals.off("SIGTERM", onQuit);
      }
      if (typeof stdin.setRawMode === "function") {
        stdin.setRawMode(false);
      }
      stdin.pause();
      stdin.off("error", onStdinError);
      try {
        if (failure?.stream !== "stdout") {
          await writeAndWait(
            stdout,
            `${RESET_STYLE}${DISABLE_MOUSE}${SHOW_CURSOR}${EXIT_ALT_SCREEN}`,
          );
        }
      } finally {
        stdout.off("error", onStdoutError);
      }
    },
  };
}
