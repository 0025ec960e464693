import type { Vec2, Vec3 } from "@keyshell/core";

/** Offset of a finger column along Y and Z, in millimeters. */
export interface ColumnOffset {
  y: number;
  z: number;
}

export interface NormalColumnSpec {
  kind: "normal";
  /** Angle between two neighboring keys of the column, in degrees. */
  curvatureAngle: number;
  offset: ColumnOffset;
}

/**
 * Edge column. Its curvature and offset are taken from the neighboring
 * normal column; only the side angle (degrees) is its own.
 */
export interface SideColumnSpec {
  kind: "side";
  sideAngle: number;
}

export type ColumnSpec = NormalColumnSpec | SideColumnSpec;

export interface FingerClusterConfig {
  rows: number;
  columns: ColumnSpec[];
  keyDistance: Vec2;
  homeRowIndex: number;
}

export interface ThumbClusterConfig {
  keys: number;
  curvatureAngle: number;
  /** Cluster rotation in degrees, applied as Z then Y then X. */
  rotation: Vec3;
  /** Offset relative to the finger cluster home row. */
  offset: Vec3;
  keyDistance: number;
  restingKeyIndex: number;
}

export interface KeyboardConfig {
  tiltingAngle: Vec2;
  circumferenceDistance: number;
  roundingRadius: number;
  shellThickness: number;
  bottomPlateThickness: number;
}

export interface PreviewConfig {
  /** Size of the smallest resolved feature, used as the meshing cell size. */
  resolution: number;
}

export interface Config {
  preview: PreviewConfig;
  fingerCluster: FingerClusterConfig;
  thumbCluster: ThumbClusterConfig;
  keyboard: KeyboardConfig;
}

export type ConfigIssueCode = "non-finite" | "non-positive" | "out-of-range" | "invalid-type" | "invalid-columns";

export interface ConfigIssue {
  code: ConfigIssueCode;
  path: string;
  message: string;
}
