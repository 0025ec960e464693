import { Euler, Matrix4, Vector3 } from "three";
import type { RigidTransform, Vec2, Vec3 } from "./types.js";

export const DEG_TO_RAD = Math.PI / 180;

export function toRadians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

export function fromMatrix4(matrix: Matrix4): RigidTransform {
  return Object.freeze({ elements: Object.freeze([...matrix.elements]) });
}

export function toMatrix4(transform: RigidTransform): Matrix4 {
  return new Matrix4().fromArray([...transform.elements]);
}

export const IDENTITY: RigidTransform = fromMatrix4(new Matrix4());

export function translation(x: number, y: number, z: number): RigidTransform {
  return fromMatrix4(new Matrix4().makeTranslation(x, y, z));
}

export function rotationX(radians: number): RigidTransform {
  return fromMatrix4(new Matrix4().makeRotationX(radians));
}

export function rotationY(radians: number): RigidTransform {
  return fromMatrix4(new Matrix4().makeRotationY(radians));
}

export function rotationZ(radians: number): RigidTransform {
  return fromMatrix4(new Matrix4().makeRotationZ(radians));
}

/** Intrinsic Z, then Y, then X rotation: the matrix product Rz * Ry * Rx. */
export function rotationZYX(x: number, y: number, z: number): RigidTransform {
  return fromMatrix4(new Matrix4().makeRotationFromEuler(new Euler(x, y, z, "ZYX")));
}

/** Left-to-right product, so `compose(a, b)` applies `b` first. */
export function compose(...transforms: RigidTransform[]): RigidTransform {
  const out = new Matrix4();
  for (const t of transforms) {
    out.multiply(toMatrix4(t));
  }
  return fromMatrix4(out);
}

export function inverse(transform: RigidTransform): RigidTransform {
  return fromMatrix4(toMatrix4(transform).invert());
}

export function transformPoint(transform: RigidTransform, p: Vec3): Vec3 {
  const v = new Vector3(p.x, p.y, p.z).applyMatrix4(toMatrix4(transform));
  return { x: v.x, y: v.y, z: v.z };
}

export function transformDirection(transform: RigidTransform, d: Vec3): Vec3 {
  const e = transform.elements;
  return {
    x: e[0] * d.x + e[4] * d.y + e[8] * d.z,
    y: e[1] * d.x + e[5] * d.y + e[9] * d.z,
    z: e[2] * d.x + e[6] * d.y + e[10] * d.z
  };
}

export function position(transform: RigidTransform): Vec3 {
  const e = transform.elements;
  return { x: e[12], y: e[13], z: e[14] };
}

export function xAxis(transform: RigidTransform): Vec3 {
  const e = transform.elements;
  return { x: e[0], y: e[1], z: e[2] };
}

export function yAxis(transform: RigidTransform): Vec3 {
  const e = transform.elements;
  return { x: e[4], y: e[5], z: e[6] };
}

export function zAxis(transform: RigidTransform): Vec3 {
  const e = transform.elements;
  return { x: e[8], y: e[9], z: e[10] };
}

/** Same orientation, new origin. */
export function withPosition(transform: RigidTransform, p: Vec3): RigidTransform {
  const elements = [...transform.elements];
  elements[12] = p.x;
  elements[13] = p.y;
  elements[14] = p.z;
  return Object.freeze({ elements: Object.freeze(elements) });
}

export function isFiniteTransform(transform: RigidTransform): boolean {
  return transform.elements.length === 16 && transform.elements.every((value) => Number.isFinite(value));
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vec3, s: number): Vec3 {
  return { x: v.x * s, y: v.y * s, z: v.z * s };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x
  };
}

export function length(v: Vec3): number {
  return Math.hypot(v.x, v.y, v.z);
}

export function normalize(v: Vec3): Vec3 {
  const len = length(v);
  return len > 0 ? scale(v, 1 / len) : { x: 0, y: 0, z: 0 };
}

export function normalize2(v: Vec2): Vec2 {
  const len = Math.hypot(v.x, v.y);
  return len > 0 ? { x: v.x / len, y: v.y / len } : { x: 0, y: 0 };
}

/**
 * Intersection of the line `origin + t * direction` with the plane through
 * `planePoint` with normal `planeNormal`; undefined when they are parallel.
 */
export function intersectLinePlane(origin: Vec3, direction: Vec3, planePoint: Vec3, planeNormal: Vec3): Vec3 | undefined {
  const denom = dot(direction, planeNormal);
  if (Math.abs(denom) < 1e-12) {
    return undefined;
  }
  const t = dot(sub(planePoint, origin), planeNormal) / denom;
  return add(origin, scale(direction, t));
}
