import { compose, normalize2, rotationZ, translation, type Vec2 } from "@keyshell/core";
import type { NodeId, SdfBuilder } from "@keyshell/sdf";
import { INSERT_HOLDER } from "./constants.js";
import type { InsertHolderPlacement } from "./types.js";

/** Directions whose extreme hull vertices carry a holder in the finger cluster. */
export const FINGER_HOLDER_DIRECTIONS: readonly Vec2[] = [
  { x: 1, y: -1 },
  { x: 1, y: 1 },
  { x: -1, y: 1 }
];

export const THUMB_HOLDER_DIRECTIONS: readonly Vec2[] = [{ x: -1, y: -1 }];

/** Index of the first vertex reaching furthest along `direction`. */
export function extremeVertex(outline: Vec2[], direction: Vec2): number {
  let best = 0;
  let bestValue = Number.NEGATIVE_INFINITY;
  outline.forEach((p, i) => {
    const value = p.x * direction.x + p.y * direction.y;
    if (value > bestValue) {
      bestValue = value;
      best = i;
    }
  });
  return best;
}

/** Bisector of the two edge normals meeting at vertex `i` of a counter-clockwise outline. */
export function outwardBisector(outline: Vec2[], i: number): Vec2 {
  const n = outline.length;
  const prev = outline[(i + n - 1) % n];
  const p = outline[i];
  const next = outline[(i + 1) % n];
  const a = normalize2({ x: p.y - prev.y, y: prev.x - p.x });
  const b = normalize2({ x: next.y - p.y, y: p.x - next.x });
  return normalize2({ x: a.x + b.x, y: a.y + b.y });
}

/**
 * Places holders in the outline corners reached along `directions`. The insert
 * keeps the wall and at least two millimetres of plastic between itself and
 * the outer surface.
 */
export function placeInsertHolders(
  outline: Vec2[],
  directions: readonly Vec2[],
  circumferenceDistance: number,
  shellThickness: number
): InsertHolderPlacement[] {
  if (outline.length < 3) {
    return [];
  }
  const inset = circumferenceDistance - INSERT_HOLDER.insertRadius - Math.max(INSERT_HOLDER.wallThickness, shellThickness);
  const seen = new Set<number>();
  const placements: InsertHolderPlacement[] = [];
  for (const direction of directions) {
    const i = extremeVertex(outline, direction);
    if (seen.has(i)) continue;
    seen.add(i);
    const vertex = outline[i];
    const outward = outwardBisector(outline, i);
    placements.push({
      vertex,
      outward,
      center: { x: vertex.x + inset * outward.x, y: vertex.y + inset * outward.y }
    });
  }
  return placements;
}

/**
 * A post around the insert with a bridge running out to the wall. The hole
 * is cut through the whole height.
 */
export function insertHolder(builder: SdfBuilder, placement: InsertHolderPlacement, reach: number): NodeId {
  const { radius, insertRadius, height } = INSERT_HOLDER;
  const post = builder.cylinder(radius, 0, height);
  const bridge = builder.boxBetween({ x: 0, y: -radius, z: 0 }, { x: reach + radius, y: radius, z: height });
  const hole = builder.cylinder(insertRadius, -1, height + 1);
  const holder = builder.difference(builder.union(post, bridge), hole);

  const angle = Math.atan2(placement.outward.y, placement.outward.x);
  return builder.transform(holder, compose(translation(placement.center.x, placement.center.y, 0), rotationZ(angle)));
}
