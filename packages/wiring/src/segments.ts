import {
  add,
  inverse,
  position,
  scale,
  sub,
  transformPoint,
  yAxis,
  type RigidTransform,
  type Vec2,
  type Vec3
} from "@keyshell/core";
import { CURVE_SEGMENTS } from "./constants.js";
import type { CurveSegment, KeySegment } from "./types.js";

/** Bend angle below which a strip is laid straight. */
const STRAIGHT_TOLERANCE = 1e-9;

/**
 * Strip reaching `offset` (along, up) from its start while leaving and
 * arriving tangentially: straight when the offset has no rise, otherwise a
 * circular arc through both ends.
 */
export function keySegment(offset: Vec2): KeySegment {
  const angle = 2 * Math.atan2(offset.y, offset.x);
  if (Math.abs(angle) < STRAIGHT_TOLERANCE) {
    return { kind: "line", length: offset.x };
  }
  const radius = (offset.x * offset.x + offset.y * offset.y) / (2 * offset.y);
  return { kind: "arc", radius, angle, length: Math.abs(radius * angle) };
}

function lerp(a: Vec3, b: Vec3, t: number): Vec3 {
  return add(scale(a, 1 - t), scale(b, t));
}

function distance(a: Vec3, b: Vec3): number {
  return Math.hypot(a.x - b.x, a.y - b.y, a.z - b.z);
}

/**
 * Cubic Bézier leaving `start` along its Y axis and arriving at `end` along
 * its Y axis. The handles reach half way along the start frame's Y axis,
 * which keeps the curvature low.
 */
export function bezierCurve(start: RigidTransform, end: RigidTransform): CurveSegment {
  const p0 = position(start);
  const p3 = position(end);
  const reach = transformPoint(inverse(start), p3).y / 2;
  const p1 = add(p0, scale(yAxis(start), reach));
  const p2 = sub(p3, scale(yAxis(end), reach));

  const points: Vec3[] = [];
  for (let i = 0; i <= CURVE_SEGMENTS; i++) {
    const t = i / CURVE_SEGMENTS;
    const a = lerp(p0, p1, t);
    const b = lerp(p1, p2, t);
    const c = lerp(p2, p3, t);
    points.push(lerp(lerp(a, b, t), lerp(b, c, t), t));
  }

  let length = 0;
  for (let i = 1; i < points.length; i++) {
    length += distance(points[i - 1], points[i]);
  }
  return { kind: "curve", points, length };
}

