export interface Vec2 {
  x: number;
  y: number;
}

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Bounds {
  minX: number;
  minY: number;
  minZ: number;
  maxX: number;
  maxY: number;
  maxZ: number;
  dx: number;
  dy: number;
  dz: number;
}

/**
 * Rigid transform stored as a column-major 4x4 matrix, the same layout
 * `Matrix4.elements` uses. Instances are frozen once built.
 */
export interface RigidTransform {
  readonly elements: readonly number[];
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export interface CanonicalHashResult {
  sha256: string;
  canonicalBytes: Uint8Array;
}
