import type { Bounds, Vec3 } from "@keyshell/core";

/** Index of a node inside its arena. */
export type NodeId = number;

export interface BoxNode {
  op: "box";
  halfExtents: Vec3;
}

export interface SphereNode {
  op: "sphere";
  radius: number;
}

/** Z-aligned cylinder centered at the origin. */
export interface CylinderNode {
  op: "cylinder";
  radius: number;
  halfHeight: number;
}

/** Everything with `dot(normal, p) <= offset`. `normal` is unit length. */
export interface HalfSpaceNode {
  op: "halfSpace";
  normal: Vec3;
  offset: number;
}

/**
 * Convex counter-clockwise polygon in the XY plane, grown by `inflate`
 * and extruded over `zMin..zMax`. Points are stored as x, y pairs.
 */
export interface PrismNode {
  op: "prism";
  polygon: number[];
  inflate: number;
  zMin: number;
  zMax: number;
}

/** Evaluates `child` in a moved frame; `matrix` maps child space to parent space. */
export interface TransformNode {
  op: "transform";
  child: NodeId;
  /** Column-major 4x4 affine matrix. */
  matrix: number[];
}

/** Reflection across the YZ plane. */
export interface MirrorXNode {
  op: "mirrorX";
  child: NodeId;
}

export interface UnionNode {
  op: "union";
  children: NodeId[];
}

export interface IntersectionNode {
  op: "intersection";
  children: NodeId[];
}

export interface DifferenceNode {
  op: "difference";
  base: NodeId;
  subtract: NodeId;
}

/** Union with a circular fillet of `radius` where the operands meet. */
export interface RoundUnionNode {
  op: "roundUnion";
  a: NodeId;
  b: NodeId;
  radius: number;
}

/** Difference whose new edges are rounded with `radius`. */
export interface RoundDifferenceNode {
  op: "roundDifference";
  base: NodeId;
  subtract: NodeId;
  radius: number;
}

export interface OffsetNode {
  op: "offset";
  child: NodeId;
  distance: number;
}

/** Hollows `child`, keeping a wall of `thickness` inside its surface. */
export interface ShellNode {
  op: "shell";
  child: NodeId;
  thickness: number;
}

export type SdfOp =
  | BoxNode
  | SphereNode
  | CylinderNode
  | HalfSpaceNode
  | PrismNode
  | TransformNode
  | MirrorXNode
  | UnionNode
  | IntersectionNode
  | DifferenceNode
  | RoundUnionNode
  | RoundDifferenceNode
  | OffsetNode
  | ShellNode;

/** An arena entry: the operation plus a conservative bounding box, null when unbounded. */
export type SdfNode = SdfOp & { bounds: Bounds | null };

/**
 * Signed distance solid: negative inside, zero on the surface, positive outside.
 * Several solids may share one arena.
 */
export interface ImplicitSolid {
  nodes: readonly SdfNode[];
  root: NodeId;
  /** Volume the solid is meshed in. */
  bounds: Bounds;
}
