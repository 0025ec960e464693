import { add, position, scale, xAxis, yAxis, type RigidTransform, type Vec2, type Vec3 } from "@keyshell/core";

export type SideX = -1 | 1;
export type SideY = -1 | 1;

/** Corner of the clearance rectangle around a key, in the key's own plane. */
export function cornerPoint(key: RigidTransform, sideX: SideX, sideY: SideY, clearance: Vec2): Vec3 {
  const offset = add(scale(xAxis(key), sideX * clearance.x), scale(yAxis(key), sideY * clearance.y));
  return add(position(key), offset);
}

export function keyCorners(keys: RigidTransform[], clearance: Vec2): Vec3[] {
  const out: Vec3[] = [];
  for (const key of keys) {
    out.push(
      cornerPoint(key, -1, -1, clearance),
      cornerPoint(key, 1, -1, clearance),
      cornerPoint(key, 1, 1, clearance),
      cornerPoint(key, -1, 1, clearance)
    );
  }
  return out;
}

function turn(o: Vec2, a: Vec2, b: Vec2): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

/** Counter-clockwise convex hull (monotone chain), collinear points dropped. */
export function convexHull(points: Vec2[]): Vec2[] {
  const sorted = [...points].sort((a, b) => a.x - b.x || a.y - b.y);
  if (sorted.length < 3) {
    return sorted;
  }

  const lower: Vec2[] = [];
  for (const p of sorted) {
    while (lower.length >= 2 && turn(lower[lower.length - 2], lower[lower.length - 1], p) <= 0) {
      lower.pop();
    }
    lower.push(p);
  }

  const upper: Vec2[] = [];
  for (let i = sorted.length - 1; i >= 0; i--) {
    const p = sorted[i];
    while (upper.length >= 2 && turn(upper[upper.length - 2], upper[upper.length - 1], p) <= 0) {
      upper.pop();
    }
    upper.push(p);
  }

  lower.pop();
  upper.pop();
  return lower.concat(upper);
}

/** Footprint of a cluster: the hull of every key corner projected onto the XY plane. */
export function clusterOutline(keys: RigidTransform[], clearance: Vec2): Vec2[] {
  return convexHull(keyCorners(keys, clearance).map((p) => ({ x: p.x, y: p.y })));
}
