import type { Color } from "@flowpair/core";

export const PRODUCT_NAME = "Flow (prototype)";

export const BG: Color = "#000000";
export const WHITE: Color = "#ffffff";
export const MUTED: Color = "#b4b4b4";

export const BUTTON_FILL: Color = "#202020";
export const BUTTON_FILL_HOVER: Color = "#404040";
export const BUTTON_BORDER: Color = "#606060";
export const BUTTON_SELECTED: Color = "#c8c8c8";

export const BUTTON_RADIUS = 10;
export const BUTTON_BORDER_WIDTH = 2;
export const SELECTED_BORDER_WIDTH = 3;
export const GRID_LINE_WIDTH = 2;
