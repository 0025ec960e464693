import type { Bounds, Vec2 } from "@keyshell/core";
import type { ImplicitSolid } from "@keyshell/sdf";

export interface InsertHolderPlacement {
  /** Hull vertex the holder sits in. */
  vertex: Vec2;
  /** Center of the insert, inside the wall. */
  center: Vec2;
  /** Unit vector pointing out of the case at the vertex. */
  outward: Vec2;
}

export interface CaseOutlines {
  finger: Vec2[];
  thumb: Vec2[];
}

/** The printable parts of one keyboard. Both halves share a single node arena. */
export interface CaseSolids {
  leftHalf: ImplicitSolid;
  rightHalf: ImplicitSolid;
  bottomPlate: ImplicitSolid;
  /** Right half footprint; the left half is its mirror image. */
  bounds: Bounds;
  outlines: CaseOutlines;
  insertHolders: InsertHolderPlacement[];
  /** Highest point of the case top, per cluster. */
  clusterHeights: { finger: number; thumb: number };
}
