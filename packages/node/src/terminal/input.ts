/**
 * packages/node/src/terminal/input.ts — Raw-mode stdin decoder.
 *
 * Turns terminal byte sequences into key names (keybinding format), a quit
 * signal for Ctrl+C, and SGR mouse reports. Escape sequences split across
 * chunks are held until the next push; a lone ESC at the end of a chunk is the
 * escape key.
 */

import { ESC } from "./ansi.js";

export type MouseAction = "press" | "release" | "move";

export type DecodedInput =
  | Readonly<{ kind: "key"; key: string }>
  | Readonly<{ kind: "quit" }>
  | Readonly<{
      kind: "mouse";
      action: MouseAction;
      /** 0 primary, 1 middle, 2 secondary. */
      button: number;
      /** 1-based terminal column. */
      col: number;
      /** 1-based terminal row. */
      row: number;
    }>;

export type InputDecoder = Readonly<{
  push: (chunk: string) => readonly DecodedInput[];
}>;

const FINAL_KEYS: Readonly<Record<string, string>> = Object.freeze({
  A: "up",
  B: "down",
  C: "right",
  D: "left",
  H: "home",
  F: "end",
});

const TILDE_KEYS: Readonly<Record<string, string>> = Object.freeze({
  "2": "insert",
  "3": "delete",
  "5": "pageup",
  "6": "pagedown",
});

const SGR_MOUSE_RE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/u;
const SGR_MOUSE_PARTIAL_RE = /^\x1b\[<[\d;]*$/u;

const MOUSE_MOTION_BIT = 32;
const MOUSE_WHEEL_BIT = 64;

function isCsiParam(code: number): boolean {
  return code >= 0x30 && code <= 0x3f;
}

function isCsiFinal(code: number): boolean {
  return code >= 0x40 && code <= 0x7e;
}

function decodeSgrMouse(text: string, at: number, out: DecodedInput[]): number {
  const rest = text.slice(at);
  const m = SGR_MOUSE_RE.exec(rest);
  if (!m) {
    return SGR_MOUSE_PARTIAL_RE.test(rest) ? 0 : 3;
  }
  const code = Number.parseInt(m[1] ?? "0", 10);
  const col = Number.parseInt(m[2] ?? "0", 10);
  const row = Number.parseInt(m[3] ?? "0", 10);
  if ((code & MOUSE_WHEEL_BIT) === 0) {
    const action: MouseAction =
      m[4] === "m" ? "release" : (code & MOUSE_MOTION_BIT) !== 0 ? "move" : "press";
    out.push({ kind: "mouse", action, button: code & 3, col, row });
  }
  return m[0].length;
}

/** Returns characters consumed, or 0 when the sequence is incomplete. */
function decodeEscape(text: string, at: number, out: DecodedInput[]): number {
  const next = text[at + 1];
  if (next === undefined || next === ESC) {
    out.push({ kind: "key", key: "escape" });
    return 1;
  }

  if (next === "O") {
    const final = text[at + 2];
    if (final === undefined) return 0;
    const key = FINAL_KEYS[final];
    if (key) out.push({ kind: "key", key });
    return 3;
  }

  if (next !== "[") {
    out.push({ kind: "key", key: `alt+${next.toLowerCase()}` });
    return 2;
  }

  if (text[at + 2] === "<") {
    return decodeSgrMouse(text, at, out);
  }

  let j = at + 2;
  while (j < text.length && isCsiParam(text.charCodeAt(j))) j++;
  if (j >= text.length) return 0;
  const finalCode = text.charCodeAt(j);
  if (!isCsiFinal(finalCode)) {
    // Not a CSI sequence after all; drop the introducer.
    return 2;
  }
  const params = text.slice(at + 2, j);
  const final = String.fromCharCode(finalCode);
  const key = final === "~" ? TILDE_KEYS[params.split(";")[0] ?? ""] : FINAL_KEYS[final];
  if (key) out.push({ kind: "key", key });
  return j - at + 1;
}

function decodePlain(text: string, at: number, out: DecodedInput[]): number {
  const code = text.codePointAt(at) ?? 0;
  const ch = String.fromCodePoint(code);

  if (code === 0x03) {
    out.push({ kind: "quit" });
    return 1;
  }
  if (ch === "\r") {
    out.push({ kind: "key", key: "enter" });
    return text[at + 1] === "\n" ? 2 : 1;
  }
  if (ch === "\n") {
    out.push({ kind: "key", key: "enter" });
    return 1;
  }
  if (ch === "\t") {
    out.push({ kind: "key", key: "tab" });
    return 1;
  }
  if (code === 0x7f || code === 0x08) {
    out.push({ kind: "key", key: "backspace" });
    return 1;
  }
  if (ch === " ") {
    out.push({ kind: "key", key: "space" });
    return 1;
  }
  if (code < 0x20) {
    out.push({ kind: "key", key: `ctrl+${String.fromCharCode(code + 0x60)}` });
    return 1;
  }
  out.push({ kind: "key", key: ch });
  return ch.length;
}

export function createInputDecoder(): InputDecoder {
  let pending = "";
  return {
    push(chunk) {
      const text = pending + chunk;
      pending = "";
      const out: DecodedInput[] = [];
      let i = 0;
      while (i < text.length) {
        if (text[i] === ESC) {
          const consumed = decodeEscape(text, i, out);
          if (consumed === 0) {
            pending = text.slice(i);
            break;
          }
          i += consumed;
          continue;
        }
        i += decodePlain(text, i, out);
      }
      return out;
    },
  };
}
