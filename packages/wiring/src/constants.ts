import type { Vec2 } from "@keyshell/core";

/** Board thickness. */
export const THICKNESS = 0.6;
/** Pad below every switch. */
export const PAD_SIZE: Vec2 = { x: 13, y: 14 };
export const FPC_PAD_SIZE: Vec2 = { x: 19, y: 4 };
/** Distance from the anchor key's pad center to the FPC pad, towards the wrist. */
export const FPC_PAD_OFFSET = 7.9;
export const CONNECTOR_WIDTH = 2;
/** Distance from the key frame down to the top of the board. */
export const SWITCH_HEIGHT = 5;
/** Samples along a curved connector. */
export const CURVE_SEGMENTS = 50;
