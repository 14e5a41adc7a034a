import {
  type Color,
  type DrawList,
  type FontRole,
  LOGICAL_FRAME_SIZE,
  type Rect,
  rectCenter,
} from "@flowpair/core";
import {
  BUTTON_BORDER,
  BUTTON_BORDER_WIDTH,
  BUTTON_FILL,
  BUTTON_FILL_HOVER,
  BUTTON_RADIUS,
  WHITE,
} from "../theme.js";

export function centeredText(
  g: DrawList,
  text: string,
  y: number,
  color: Color = WHITE,
  font: FontRole = "body",
): void {
  g.text(text, Math.floor(LOGICAL_FRAME_SIZE / 2), y, color, font);
}

export function button(g: DrawList, rect: Rect, label: string, hover: boolean): void {
  g.fillRoundedRect(rect, BUTTON_RADIUS, hover ? BUTTON_FILL_HOVER : BUTTON_FILL);
  g.strokeRoundedRect(rect, BUTTON_RADIUS, BUTTON_BORDER_WIDTH, BUTTON_BORDER);
  const center = rectCenter(rect);
  g.text(label, center.x, center.y, WHITE);
}
