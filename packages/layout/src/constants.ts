/** Gap kept between neighboring keycaps. */
export const KEY_CLEARANCE = 1;
/** Height of the keycap top above the switch mount, added to every arc radius. */
export const CURVATURE_HEIGHT = 6.6;
/** Space left of the finger cluster after placement. */
export const CENTER_OFFSET = 10;
/** Height of the lowest key above the ground plane after placement. */
export const Z_OFFSET = 12;
