/** Switch body cutout, centered on every key frame. */
export const SWITCH_CUTOUT = { x: 14, y: 14, z: 10 } as const;

/** Threaded heat set insert holders. */
export const INSERT_HOLDER = {
  insertRadius: 2,
  wallThickness: 2,
  /** Outer radius of the post: insert plus wall. */
  radius: 4,
  height: 7
} as const;

export const BOTTOM_PLATE_HOLE_RADIUS = 1.6;

/** Interface board carrying the USB and TRRS connectors. */
export const INTERFACE = {
  holderThickness: 1,
  pcbThickness: 1.6,
  tolerance: 0.1,
  usb: { width: 9, height: 3.2, radius: 1.1, offset: 24.9, z: 3.2 },
  jack: { radius: 3, offsetLeft: 5.4, offsetRight: 10.7, z: 2.45 },
  /** How far the cutouts reach into the case from the outline edge. */
  depth: 5
} as const;
