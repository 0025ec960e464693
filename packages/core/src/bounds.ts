import type { Bounds, Vec2, Vec3 } from "./types.js";

export function boundsFromExtents(minX: number, minY: number, minZ: number, maxX: number, maxY: number, maxZ: number): Bounds {
  return {
    minX,
    minY,
    minZ,
    maxX,
    maxY,
    maxZ,
    dx: maxX - minX,
    dy: maxY - minY,
    dz: maxZ - minZ
  };
}

export function emptyBounds(): Bounds {
  return boundsFromExtents(0, 0, 0, -1, -1, -1);
}

export function computeBounds(points: Vec3[]): Bounds {
  if (points.length === 0) {
    return emptyBounds();
  }

  let minX = points[0].x;
  let minY = points[0].y;
  let minZ = points[0].z;
  let maxX = points[0].x;
  let maxY = points[0].y;
  let maxZ = points[0].z;

  for (let i = 1; i < points.length; i++) {
    const p = points[i];
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.z < minZ) minZ = p.z;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
    if (p.z > maxZ) maxZ = p.z;
  }

  return boundsFromExtents(minX, minY, minZ, maxX, maxY, maxZ);
}

/** Footprint of a planar outline grown by `margin`, spanning `minZ..maxZ`. */
export function boundsFromOutline(points: Vec2[], minZ: number, maxZ: number, margin: number): Bounds {
  const flat = computeBounds(points.map((p) => ({ x: p.x, y: p.y, z: 0 })));
  return boundsFromExtents(
    flat.minX - margin,
    flat.minY - margin,
    minZ,
    flat.maxX + margin,
    flat.maxY + margin,
    maxZ
  );
}

export function isEmptyBounds(bounds: Bounds): boolean {
  return bounds.dx < 0 || bounds.dy < 0 || bounds.dz < 0;
}

export function isDegenerateBounds(bounds: Bounds): boolean {
  const sizes = [bounds.dx, bounds.dy, bounds.dz];
  return sizes.some((size) => !Number.isFinite(size) || size <= 0);
}

export function unionBounds(a: Bounds, b: Bounds): Bounds {
  if (isEmptyBounds(a)) return b;
  if (isEmptyBounds(b)) return a;
  return boundsFromExtents(
    Math.min(a.minX, b.minX),
    Math.min(a.minY, b.minY),
    Math.min(a.minZ, b.minZ),
    Math.max(a.maxX, b.maxX),
    Math.max(a.maxY, b.maxY),
    Math.max(a.maxZ, b.maxZ)
  );
}

export function expandBounds(bounds: Bounds, margin: number): Bounds {
  return boundsFromExtents(
    bounds.minX - margin,
    bounds.minY - margin,
    bounds.minZ - margin,
    bounds.maxX + margin,
    bounds.maxY + margin,
    bounds.maxZ + margin
  );
}

/** Reflection across the YZ plane (x -> -x). */
export function mirrorBoundsYZ(bounds: Bounds): Bounds {
  return boundsFromExtents(-bounds.maxX, bounds.minY, bounds.minZ, -bounds.minX, bounds.maxY, bounds.maxZ);
}

export function boundsCenter(bounds: Bounds): Vec3 {
  return {
    x: (bounds.minX + bounds.maxX) / 2,
    y: (bounds.minY + bounds.maxY) / 2,
    z: (bounds.minZ + bounds.maxZ) / 2
  };
}

export function boundsDiameter(bounds: Bounds): number {
  return Math.hypot(bounds.dx, bounds.dy, bounds.dz);
}

export function containsPoint(bounds: Bounds, p: Vec3): boolean {
  return (
    p.x >= bounds.minX &&
    p.x <= bounds.maxX &&
    p.y >= bounds.minY &&
    p.y <= bounds.maxY &&
    p.z >= bounds.minZ &&
    p.z <= bounds.maxZ
  );
}
