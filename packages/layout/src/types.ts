import type { RigidTransform, Vec2 } from "@keyshell/core";

export type ColumnKind = "normal" | "side";

export interface ColumnLayout {
  index: number;
  kind: ColumnKind;
  /** Curvature in degrees; side columns report the value of their donor column. */
  curvatureAngle: number;
  /** Degrees, zero for normal columns. */
  sideAngle: number;
  /** Index of the column the curvature was taken from. Equals `index` for normal columns. */
  curvatureSource: number;
  /** One transform per row, first row first. */
  keys: RigidTransform[];
}

export interface LayoutResult {
  rows: number;
  homeRowIndex: number;
  restingKeyIndex: number;
  columns: ColumnLayout[];
  thumbKeys: RigidTransform[];
  /** Half extents of the space reserved around a finger key. */
  fingerKeyClearance: Vec2;
  /** Half extents of the space reserved around a thumb key. */
  thumbKeyClearance: Vec2;
  /** Places the thumb arc in the untilted finger cluster frame. */
  thumbClusterTransform: RigidTransform;
  /** Tilt and translation applied to every key after both clusters are solved. */
  placement: RigidTransform;
}

export interface ClusterKeys {
  keys: RigidTransform[];
  clearance: Vec2;
}
