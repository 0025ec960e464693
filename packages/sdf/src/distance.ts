// Distance functions after the hg_sdf formulations: exact for primitives,
// circular fillets for the rounded operators.

export function boxDistance(x: number, y: number, z: number, hx: number, hy: number, hz: number): number {
  const qx = Math.abs(x) - hx;
  const qy = Math.abs(y) - hy;
  const qz = Math.abs(z) - hz;
  const outside = Math.hypot(Math.max(qx, 0), Math.max(qy, 0), Math.max(qz, 0));
  const inside = Math.min(Math.max(qx, qy, qz), 0);
  return outside + inside;
}

/** Combines a planar distance with a distance along the extrusion axis. */
export function extrudeDistance(planar: number, axial: number): number {
  return Math.min(Math.max(planar, axial), 0) + Math.hypot(Math.max(planar, 0), Math.max(axial, 0));
}

export function cylinderDistance(x: number, y: number, z: number, radius: number, halfHeight: number): number {
  return extrudeDistance(Math.hypot(x, y) - radius, Math.abs(z) - halfHeight);
}

/**
 * Exact distance to a convex counter-clockwise polygon given as x, y pairs.
 * Degenerate input (fewer than three points) returns +Infinity.
 */
export function convexPolygonDistance(px: number, py: number, polygon: number[]): number {
  const n = polygon.length / 2;
  if (n < 3) {
    return Number.POSITIVE_INFINITY;
  }

  let maxEdge = Number.NEGATIVE_INFINITY;
  let minSquared = Number.POSITIVE_INFINITY;
  for (let i = 0; i < n; i++) {
    const ax = polygon[2 * i];
    const ay = polygon[2 * i + 1];
    const j = (i + 1) % n;
    const bx = polygon[2 * j];
    const by = polygon[2 * j + 1];

    const ex = bx - ax;
    const ey = by - ay;
    const wx = px - ax;
    const wy = py - ay;
    const lengthSquared = ex * ex + ey * ey;
    if (lengthSquared === 0) continue;

    // Outward normal of a counter-clockwise edge is (ey, -ex)
    const signed = (wx * ey - wy * ex) / Math.sqrt(lengthSquared);
    if (signed > maxEdge) maxEdge = signed;

    const t = Math.min(1, Math.max(0, (wx * ex + wy * ey) / lengthSquared));
    const dx = wx - ex * t;
    const dy = wy - ey * t;
    const squared = dx * dx + dy * dy;
    if (squared < minSquared) minSquared = squared;
  }

  return maxEdge <= 0 ? maxEdge : Math.sqrt(minSquared);
}

export function roundUnion(a: number, b: number, r: number): number {
  const ux = Math.max(r - a, 0);
  const uy = Math.max(r - b, 0);
  return Math.max(r, Math.min(a, b)) - Math.hypot(ux, uy);
}

export function roundIntersection(a: number, b: number, r: number): number {
  const ux = Math.max(r + a, 0);
  const uy = Math.max(r + b, 0);
  return Math.min(-r, Math.max(a, b)) + Math.hypot(ux, uy);
}

export function roundDifference(a: number, b: number, r: number): number {
  return roundIntersection(a, -b, r);
}
