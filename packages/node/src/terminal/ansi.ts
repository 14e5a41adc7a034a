import type { Pixel } from "@flowpair/core";

export const ESC = "\x1b";
export const CSI = `${ESC}[`;

export const ENTER_ALT_SCREEN = `${CSI}?1049h`;
export const EXIT_ALT_SCREEN = `${CSI}?1049l`;
export const HIDE_CURSOR = `${CSI}?25l`;
export const SHOW_CURSOR = `${CSI}?25h`;
export const RESET_STYLE = `${CSI}0m`;
export const CLEAR_SCREEN = `${CSI}2J`;

/** Button presses (1000), any-motion reports (1003), SGR coordinates (1006). */
export const ENABLE_MOUSE = `${CSI}?1000h${CSI}?1003h${CSI}?1006h`;
export const DISABLE_MOUSE = `${CSI}?1006l${CSI}?1003l${CSI}?1000l`;

export function moveTo(row: number, col: number): string {
  return `${CSI}${String(row)};${String(col)}H`;
}

export function setTitle(title: string): string {
  return `${ESC}]0;${title}\x07`;
}

export function fgColor(p: Pixel): string {
  return `${CSI}38;2;${String(p.r)};${String(p.g)};${String(p.b)}m`;
}

export function bgColor(p: Pixel): string {
  return `${CSI}48;2;${String(p.r)};${String(p.g)};${String(p.b)}m`;
}

export function bold(on: boolean): string {
  return on ? `${CSI}1m` : `${CSI}22m`;
}
