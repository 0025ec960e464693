import {
  add,
  compose,
  inverse,
  position,
  rotationZ,
  scale,
  sub,
  transformDirection,
  transformPoint,
  withPosition,
  xAxis,
  yAxis,
  zAxis,
  type RigidTransform,
  type Vec3
} from "@keyshell/core";
import { CONNECTOR_WIDTH, PAD_SIZE, SWITCH_HEIGHT, THICKNESS } from "./constants.js";
import { bezierCurve, keySegment } from "./segments.js";
import type { ClusterConnector, ColumnConnector, KeyConnector, KeyId } from "./types.js";

export type Side = -1 | 1;

/** Depth of the board's mid plane below a key frame. */
const BOARD_DEPTH = SWITCH_HEIGHT + THICKNESS / 2;

export function padCenter(key: RigidTransform): Vec3 {
  return sub(position(key), scale(zAxis(key), BOARD_DEPTH));
}

/** Middle of the pad's top (+1) or bottom (-1) edge. */
export function verticalConnectorPoint(key: RigidTransform, side: Side): Vec3 {
  return add(padCenter(key), scale(yAxis(key), (side * PAD_SIZE.y) / 2));
}

/** Middle of the pad's right (+1) or left (-1) edge. */
export function horizontalConnectorPoint(key: RigidTransform, side: Side): Vec3 {
  return add(padCenter(key), scale(xAxis(key), (side * PAD_SIZE.x) / 2));
}

function localOffset(frame: RigidTransform, from: Vec3, to: Vec3): Vec3 {
  return transformDirection(inverse(frame), sub(to, from));
}

/** Key frame turned so its Y axis points along the key's X axis. */
function sideways(key: RigidTransform, at: Vec3): RigidTransform {
  return withPosition(compose(key, rotationZ(-Math.PI / 2)), at);
}

function turned(key: RigidTransform, at: Vec3): RigidTransform {
  return withPosition(compose(key, rotationZ(Math.PI)), at);
}

/** Strip from the top edge of `bottom` to the bottom edge of `top`. */
export function columnKeyConnector(from: KeyId, bottom: RigidTransform, to: KeyId, top: RigidTransform): KeyConnector {
  const start = verticalConnectorPoint(bottom, 1);
  const offset = localOffset(bottom, start, verticalConnectorPoint(top, -1));
  return {
    from,
    to,
    start: withPosition(bottom, start),
    segment: keySegment({ x: offset.y, y: offset.z }),
    lateral: offset.x
  };
}

/** Strip from the right edge of `left` to the left edge of `right`. */
export function sideKeyConnector(from: KeyId, left: RigidTransform, to: KeyId, right: RigidTransform): KeyConnector {
  const start = horizontalConnectorPoint(left, 1);
  const offset = localOffset(left, start, horizontalConnectorPoint(right, -1));
  return {
    from,
    to,
    start: sideways(left, start),
    segment: keySegment({ x: offset.x, y: offset.z }),
    lateral: offset.y
  };
}

function normalConnectorPosition(key: RigidTransform, arcRadius: number, sideX: Side, sideY: Side): RigidTransform {
  const along = sideX * (PAD_SIZE.x / 2 + arcRadius);
  const across = sideY * ((PAD_SIZE.y - CONNECTOR_WIDTH) / 2 - arcRadius);
  return withPosition(key, add(add(padCenter(key), scale(xAxis(key), along)), scale(yAxis(key), across)));
}

/**
 * Connector between the home row keys of two neighbouring columns. Two
 * normal columns are joined by a curve that bends out of the pad edges;
 * a side column is reached by a plain strip between the pad sides.
 */
export function columnConnector(
  from: KeyId,
  left: RigidTransform,
  to: KeyId,
  right: RigidTransform,
  bothNormal: boolean
): ColumnConnector {
  if (!bothNormal) {
    const { start, segment, lateral } = sideKeyConnector(from, left, to, right);
    return { kind: "side", from, to, start, segment, lateral };
  }

  const relative = transformPoint(inverse(left), position(right));
  const arcRadius = (relative.x - PAD_SIZE.x) / 2;
  const arcSide: Side = relative.z >= 0 ? 1 : -1;
  const start = normalConnectorPosition(left, arcRadius, 1, arcSide);
  const end = normalConnectorPosition(right, arcRadius, -1, arcSide === 1 ? -1 : 1);
  return { kind: "normal", from, to, arcRadius, arcSide, curve: bezierCurve(start, end) };
}

/** Curve from the bottom edge of the finger anchor key to the top edge of the first thumb key. */
export function clusterConnector(from: KeyId, fingerKey: RigidTransform, to: KeyId, thumbKey: RigidTransform): ClusterConnector {
  const start = turned(fingerKey, verticalConnectorPoint(fingerKey, -1));
  const end = turned(thumbKey, verticalConnectorPoint(thumbKey, 1));
  return { from, to, curve: bezierCurve(start, end) };
}
