import {
  boundsFromExtents,
  computeBounds,
  expandBounds,
  mirrorBoundsYZ,
  unionBounds,
  type Bounds,
  type RigidTransform,
  type Vec2,
  type Vec3
} from "@keyshell/core";
import type { ImplicitSolid, NodeId, SdfNode } from "./nodes.js";

function transformBounds(bounds: Bounds, m: readonly number[]): Bounds {
  const corners: Vec3[] = [];
  for (const x of [bounds.minX, bounds.maxX]) {
    for (const y of [bounds.minY, bounds.maxY]) {
      for (const z of [bounds.minZ, bounds.maxZ]) {
        corners.push({
          x: m[0] * x + m[4] * y + m[8] * z + m[12],
          y: m[1] * x + m[5] * y + m[9] * z + m[13],
          z: m[2] * x + m[6] * y + m[10] * z + m[14]
        });
      }
    }
  }
  return computeBounds(corners);
}

function intersectBounds(a: Bounds, b: Bounds): Bounds {
  return boundsFromExtents(
    Math.max(a.minX, b.minX),
    Math.max(a.minY, b.minY),
    Math.max(a.minZ, b.minZ),
    Math.min(a.maxX, b.maxX),
    Math.min(a.maxY, b.maxY),
    Math.min(a.maxZ, b.maxZ)
  );
}

/**
 * Append-only arena of SDF nodes. Operations return node ids, so one
 * subtree can feed any number of parents without being copied.
 */
export class SdfBuilder {
  private readonly nodes: SdfNode[] = [];
  private snapshot: readonly SdfNode[] | null = null;

  public get size(): number {
    return this.nodes.length;
  }

  public boundsOf(id: NodeId): Bounds | null {
    return this.node(id).bounds;
  }

  public box(size: Vec3): NodeId {
    const h = { x: size.x / 2, y: size.y / 2, z: size.z / 2 };
    return this.push({ op: "box", halfExtents: h, bounds: boundsFromExtents(-h.x, -h.y, -h.z, h.x, h.y, h.z) });
  }

  /** Axis-aligned box spanning `min..max`. */
  public boxBetween(min: Vec3, max: Vec3): NodeId {
    const box = this.box({ x: max.x - min.x, y: max.y - min.y, z: max.z - min.z });
    return this.translate(box, { x: (min.x + max.x) / 2, y: (min.y + max.y) / 2, z: (min.z + max.z) / 2 });
  }

  public sphere(radius: number): NodeId {
    return this.push({ op: "sphere", radius, bounds: boundsFromExtents(-radius, -radius, -radius, radius, radius, radius) });
  }

  /** Z-aligned cylinder spanning `zMin..zMax`. */
  public cylinder(radius: number, zMin: number, zMax: number): NodeId {
    const halfHeight = (zMax - zMin) / 2;
    const cylinder = this.push({
      op: "cylinder",
      radius,
      halfHeight,
      bounds: boundsFromExtents(-radius, -radius, -halfHeight, radius, radius, halfHeight)
    });
    return this.translate(cylinder, { x: 0, y: 0, z: (zMin + zMax) / 2 });
  }

  public halfSpace(normal: Vec3, offset: number): NodeId {
    const length = Math.hypot(normal.x, normal.y, normal.z);
    if (length === 0) {
      throw new Error("Half space normal must not be zero");
    }
    return this.push({
      op: "halfSpace",
      normal: { x: normal.x / length, y: normal.y / length, z: normal.z / length },
      offset: offset / length,
      bounds: null
    });
  }

  /** Convex counter-clockwise polygon grown by `inflate` and extruded over `zMin..zMax`. */
  public prism(polygon: Vec2[], zMin: number, zMax: number, inflate = 0): NodeId {
    const flat = computeBounds(polygon.map((p) => ({ x: p.x, y: p.y, z: 0 })));
    return this.push({
      op: "prism",
      polygon: polygon.flatMap((p) => [p.x, p.y]),
      inflate,
      zMin,
      zMax,
      bounds: boundsFromExtents(flat.minX - inflate, flat.minY - inflate, zMin, flat.maxX + inflate, flat.maxY + inflate, zMax)
    });
  }

  public transform(child: NodeId, transform: RigidTransform): NodeId {
    const matrix = [...transform.elements];
    const bounds = this.node(child).bounds;
    return this.push({ op: "transform", child, matrix, bounds: bounds ? transformBounds(bounds, matrix) : null });
  }

  public translate(child: NodeId, offset: Vec3): NodeId {
    return this.transform(child, {
      elements: [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, offset.x, offset.y, offset.z, 1]
    });
  }

  public mirrorX(child: NodeId): NodeId {
    const bounds = this.node(child).bounds;
    return this.push({ op: "mirrorX", child, bounds: bounds ? mirrorBoundsYZ(bounds) : null });
  }

  public union(...children: NodeId[]): NodeId {
    if (children.length === 0) {
      throw new Error("Union needs at least one operand");
    }
    if (children.length === 1) {
      return children[0];
    }
    let bounds: Bounds | null = null;
    for (const id of children) {
      const childBounds = this.node(id).bounds;
      if (!childBounds) {
        bounds = null;
        break;
      }
      bounds = bounds ? unionBounds(bounds, childBounds) : childBounds;
    }
    return this.push({ op: "union", children, bounds });
  }

  public intersection(...children: NodeId[]): NodeId {
    if (children.length === 0) {
      throw new Error("Intersection needs at least one operand");
    }
    if (children.length === 1) {
      return children[0];
    }
    let bounds: Bounds | null = null;
    for (const id of children) {
      const childBounds = this.node(id).bounds;
      if (childBounds) {
        bounds = bounds ? intersectBounds(bounds, childBounds) : childBounds;
      }
    }
    return this.push({ op: "intersection", children, bounds });
  }

  public difference(base: NodeId, ...subtract: NodeId[]): NodeId {
    if (subtract.length === 0) {
      return base;
    }
    return this.push({ op: "difference", base, subtract: this.union(...subtract), bounds: this.node(base).bounds });
  }

  public roundUnion(a: NodeId, b: NodeId, radius: number): NodeId {
    const boundsA = this.node(a).bounds;
    const boundsB = this.node(b).bounds;
    const bounds = boundsA && boundsB ? expandBounds(unionBounds(boundsA, boundsB), radius) : null;
    return this.push({ op: "roundUnion", a, b, radius, bounds });
  }

  public roundDifference(base: NodeId, subtract: NodeId, radius: number): NodeId {
    return this.push({ op: "roundDifference", base, subtract, radius, bounds: this.node(base).bounds });
  }

  public offset(child: NodeId, distance: number): NodeId {
    const bounds = this.node(child).bounds;
    return this.push({
      op: "offset",
      child,
      distance,
      bounds: bounds && distance > 0 ? expandBounds(bounds, distance) : bounds
    });
  }

  public shell(child: NodeId, thickness: number): NodeId {
    return this.push({ op: "shell", child, thickness, bounds: this.node(child).bounds });
  }

  /**
   * Wraps `root` as a solid meshed within `bounds`. Solids taken between two
   * pushes share the same frozen arena.
   */
  public solid(root: NodeId, bounds: Bounds): ImplicitSolid {
    if (!this.nodes[root]) {
      throw new Error(`Unknown SDF node ${root}`);
    }
    if (!this.snapshot) {
      this.snapshot = Object.freeze([...this.nodes]);
    }
    return Object.freeze({ nodes: this.snapshot, root, bounds });
  }

  private node(id: NodeId): SdfNode {
    const node = this.nodes[id];
    if (!node) {
      throw new Error(`Unknown SDF node ${id}`);
    }
    return node;
  }

  private push(node: SdfNode): NodeId {
    this.snapshot = null;
    this.nodes.push(node);
    return this.nodes.length - 1;
  }
}
