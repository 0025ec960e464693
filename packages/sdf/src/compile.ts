import type { Vec3 } from "@keyshell/core";
import {
  boxDistance,
  convexPolygonDistance,
  cylinderDistance,
  extrudeDistance,
  roundDifference,
  roundUnion
} from "./distance.js";
import type { ImplicitSolid, NodeId, SdfNode } from "./nodes.js";

export type SdfFunction = (x: number, y: number, z: number) => number;

/** Inverts the affine part of a column-major 4x4 matrix into a row-major 3x4 one. */
function invertAffine(m: readonly number[]): number[] {
  const a = m[0];
  const b = m[4];
  const c = m[8];
  const d = m[1];
  const e = m[5];
  const f = m[9];
  const g = m[2];
  const h = m[6];
  const i = m[10];
  const tx = m[12];
  const ty = m[13];
  const tz = m[14];

  const A = e * i - f * h;
  const B = -(d * i - f * g);
  const C = d * h - e * g;
  const det = a * A + b * B + c * C;
  if (det === 0 || !Number.isFinite(det)) {
    throw new Error("SDF transform is not invertible");
  }
  const inv = 1 / det;

  const r00 = A * inv;
  const r01 = -(b * i - c * h) * inv;
  const r02 = (b * f - c * e) * inv;
  const r10 = B * inv;
  const r11 = (a * i - c * g) * inv;
  const r12 = -(a * f - c * d) * inv;
  const r20 = C * inv;
  const r21 = -(a * h - b * g) * inv;
  const r22 = (a * e - b * d) * inv;

  return [
    r00, r01, r02, -(r00 * tx + r01 * ty + r02 * tz),
    r10, r11, r12, -(r10 * tx + r11 * ty + r12 * tz),
    r20, r21, r22, -(r20 * tx + r21 * ty + r22 * tz)
  ];
}

class Compiler {
  private readonly cache = new Map<NodeId, SdfFunction>();

  public constructor(private readonly nodes: readonly SdfNode[]) {}

  public compile(id: NodeId): SdfFunction {
    const cached = this.cache.get(id);
    if (cached) return cached;
    const node = this.nodes[id];
    if (!node) {
      throw new Error(`Unknown SDF node ${id}`);
    }
    const fn = this.build(node);
    this.cache.set(id, fn);
    return fn;
  }

  private build(node: SdfNode): SdfFunction {
    switch (node.op) {
      case "box": {
        const { x: hx, y: hy, z: hz } = node.halfExtents;
        return (x, y, z) => boxDistance(x, y, z, hx, hy, hz);
      }
      case "sphere": {
        const r = node.radius;
        return (x, y, z) => Math.sqrt(x * x + y * y + z * z) - r;
      }
      case "cylinder": {
        const { radius, halfHeight } = node;
        return (x, y, z) => cylinderDistance(x, y, z, radius, halfHeight);
      }
      case "halfSpace": {
        const { x: nx, y: ny, z: nz } = node.normal;
        const offset = node.offset;
        return (x, y, z) => nx * x + ny * y + nz * z - offset;
      }
      case "prism": {
        const polygon = [...node.polygon];
        const inflate = node.inflate;
        const center = (node.zMin + node.zMax) / 2;
        const halfHeight = (node.zMax - node.zMin) / 2;
        return (x, y, z) =>
          extrudeDistance(convexPolygonDistance(x, y, polygon) - inflate, Math.abs(z - center) - halfHeight);
      }
      case "transform": {
        const child = this.compile(node.child);
        const [m00, m01, m02, m03, m10, m11, m12, m13, m20, m21, m22, m23] = invertAffine(node.matrix);
        return (x, y, z) =>
          child(
            m00 * x + m01 * y + m02 * z + m03,
            m10 * x + m11 * y + m12 * z + m13,
            m20 * x + m21 * y + m22 * z + m23
          );
      }
      case "mirrorX": {
        const child = this.compile(node.child);
        return (x, y, z) => child(-x, y, z);
      }
      case "union":
        return this.union(node.children);
      case "intersection": {
        const children = node.children.map((id) => this.compile(id));
        return (x, y, z) => {
          let value = Number.NEGATIVE_INFINITY;
          for (const child of children) {
            const v = child(x, y, z);
            if (v > value) value = v;
          }
          return value;
        };
      }
      case "difference": {
        const base = this.compile(node.base);
        const subtract = this.compile(node.subtract);
        return (x, y, z) => Math.max(base(x, y, z), -subtract(x, y, z));
      }
      case "roundUnion": {
        const a = this.compile(node.a);
        const b = this.compile(node.b);
        const r = node.radius;
        return (x, y, z) => roundUnion(a(x, y, z), b(x, y, z), r);
      }
      case "roundDifference": {
        const base = this.compile(node.base);
        const subtract = this.compile(node.subtract);
        const r = node.radius;
        return (x, y, z) => roundDifference(base(x, y, z), subtract(x, y, z), r);
      }
      case "offset": {
        const child = this.compile(node.child);
        const distance = node.distance;
        return (x, y, z) => child(x, y, z) - distance;
      }
      case "shell": {
        const child = this.compile(node.child);
        const thickness = node.thickness;
        return (x, y, z) => {
          const v = child(x, y, z);
          return Math.max(v, -v - thickness);
        };
      }
    }
  }

  /**
   * Minimum over the children. A bounded child is skipped when the distance
   * to its bounding sphere already exceeds the best value found so far.
   */
  private union(ids: NodeId[]): SdfFunction {
    const children = ids.map((id) => this.compile(id));
    const count = children.length;
    const centers = new Float64Array(count * 3);
    const radii = new Float64Array(count).fill(-1);

    ids.forEach((id, i) => {
      const bounds = this.nodes[id]?.bounds;
      if (!bounds) return;
      centers[3 * i] = (bounds.minX + bounds.maxX) / 2;
      centers[3 * i + 1] = (bounds.minY + bounds.maxY) / 2;
      centers[3 * i + 2] = (bounds.minZ + bounds.maxZ) / 2;
      radii[i] = Math.hypot(bounds.dx, bounds.dy, bounds.dz) / 2;
    });

    return (x, y, z) => {
      let best = Number.POSITIVE_INFINITY;
      for (let i = 0; i < count; i++) {
        const radius = radii[i];
        if (radius >= 0) {
          const dx = x - centers[3 * i];
          const dy = y - centers[3 * i + 1];
          const dz = z - centers[3 * i + 2];
          const lower = Math.sqrt(dx * dx + dy * dy + dz * dz) - radius;
          if (lower > 0 && lower >= best) continue;
        }
        const v = children[i](x, y, z);
        if (v < best) best = v;
      }
      return best;
    };
  }
}

export function compileSolid(solid: ImplicitSolid): SdfFunction {
  return new Compiler(solid.nodes).compile(solid.root);
}

export function evaluate(solid: ImplicitSolid, p: Vec3): number {
  return compileSolid(solid)(p.x, p.y, p.z);
}

/**
 * Normalized gradient from four samples on a tetrahedron around the point.
 * Falls back to +Z where the field is flat.
 */
export function gradient(fn: SdfFunction, x: number, y: number, z: number, h: number): Vec3 {
  const a = fn(x + h, y - h, z - h);
  const b = fn(x - h, y - h, z + h);
  const c = fn(x - h, y + h, z - h);
  const d = fn(x + h, y + h, z + h);
  const gx = a - b - c + d;
  const gy = -a - b + c + d;
  const gz = -a + b - c + d;
  const length = Math.hypot(gx, gy, gz);
  if (length === 0 || !Number.isFinite(length)) {
    return { x: 0, y: 0, z: 1 };
  }
  return { x: gx / length, y: gy / length, z: gz / length };
}
