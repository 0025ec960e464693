import { add, cross, normalize, scale, type RigidTransform, type Vec2, type Vec3 } from "@keyshell/core";
import type { NodeId, SdfBuilder } from "@keyshell/sdf";
import { INTERFACE, INSERT_HOLDER } from "./constants.js";
import { extremeVertex } from "./insert-holders.js";

export type CaseSide = "left" | "right";

/** Where the interface board meets the case wall. */
export interface PortFrame {
  /** Start of the board along the wall, on the outline edge at z = 0. */
  origin: Vec3;
  /** Unit direction along the wall. */
  along: Vec3;
  /** Unit direction out of the case. */
  outward: Vec3;
}

const UP: Vec3 = { x: 0, y: 0, z: 1 };

/**
 * The interface board sits along the top edge of the finger outline, next to
 * its top-left corner.
 */
export function portFrame(fingerOutline: Vec2[]): PortFrame | undefined {
  const n = fingerOutline.length;
  if (n < 3) {
    return undefined;
  }
  const i = extremeVertex(fingerOutline, { x: -1, y: 1 });
  const corner = fingerOutline[i];
  const previous = fingerOutline[(i + n - 1) % n];
  const edge = { x: corner.x - previous.x, y: corner.y - previous.y, z: 0 };
  if (edge.x === 0 && edge.y === 0) {
    return undefined;
  }
  const along = normalize({ x: -edge.x, y: -edge.y, z: 0 });
  const outward = normalize({ x: edge.y, y: -edge.x, z: 0 });
  const origin = add({ x: corner.x, y: corner.y, z: 0 }, scale(along, 2 * INSERT_HOLDER.radius));
  return { origin, along, outward };
}

/** Frame centered on a connector, its Z axis pointing out of the case. */
function connectorFrame(frame: PortFrame, offset: number, height: number): RigidTransform {
  const center = add(add(frame.origin, scale(frame.along, offset)), scale(UP, height));
  const x = cross(UP, frame.outward);
  return {
    elements: [
      x.x, x.y, x.z, 0,
      UP.x, UP.y, UP.z, 0,
      frame.outward.x, frame.outward.y, frame.outward.z, 0,
      center.x, center.y, center.z, 1
    ]
  };
}

function boardHeight(connectorHeight: number): number {
  return INTERFACE.holderThickness + INTERFACE.pcbThickness + connectorHeight;
}

/** Openings the connectors of one half need in the wall. */
export function portCutouts(
  builder: SdfBuilder,
  frame: PortFrame,
  side: CaseSide,
  circumferenceDistance: number
): NodeId[] {
  const zMin = -INTERFACE.depth;
  const zMax = circumferenceDistance + INTERFACE.depth;
  const { usb, jack, tolerance } = INTERFACE;

  const jackOffset = side === "left" ? jack.offsetLeft : jack.offsetRight;
  const jackCutout = builder.transform(
    builder.cylinder(jack.radius + tolerance, zMin, zMax),
    connectorFrame(frame, jackOffset, boardHeight(jack.z))
  );
  if (side === "right") {
    return [jackCutout];
  }

  const hx = usb.width / 2 - usb.radius;
  const hy = usb.height / 2 - usb.radius;
  const rectangle: Vec2[] = [
    { x: -hx, y: -hy },
    { x: hx, y: -hy },
    { x: hx, y: hy },
    { x: -hx, y: hy }
  ];
  const usbCutout = builder.transform(
    builder.prism(rectangle, zMin, zMax, usb.radius + tolerance),
    connectorFrame(frame, usb.offset, boardHeight(usb.z))
  );
  return [usbCutout, jackCutout];
}
