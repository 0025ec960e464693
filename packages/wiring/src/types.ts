import type { RigidTransform, Vec3 } from "@keyshell/core";

/** `finger:c{column}r{row}` or `thumb:{index}`, zero based. */
export type KeyId = string;

export type KeyCluster = "finger" | "thumb";

/** Pose on the flattened board: millimetres and degrees, reference key at the origin. */
export interface BoardAnchor {
  x: number;
  y: number;
  angle: number;
}

export interface WiredKey {
  id: KeyId;
  cluster: KeyCluster;
  /** Column for finger keys, arc position for thumb keys. */
  column: number;
  /** Row for finger keys, always 0 for thumb keys. */
  row: number;
  rowNet: string;
  columnNet: string;
  /** Center of the pad below the switch, in case coordinates. */
  padCenter: Vec3;
  anchor: BoardAnchor;
}

export interface LineSegment {
  kind: "line";
  length: number;
}

/** Arc bending towards the key side of the board. `angle` is in radians. */
export interface ArcSegment {
  kind: "arc";
  radius: number;
  angle: number;
  length: number;
}

export interface CurveSegment {
  kind: "curve";
  points: Vec3[];
  length: number;
}

export type KeySegment = LineSegment | ArcSegment;

/** Flexible strip between two neighbouring keys of a column or of the thumb arc. */
export interface KeyConnector {
  from: KeyId;
  to: KeyId;
  /** Frame at the start of the strip; the strip runs along its Y axis. */
  start: RigidTransform;
  segment: KeySegment;
  /** Sideways shift of the far key across the strip, in the start key's plane. */
  lateral: number;
}

export type ColumnConnector =
  | {
      kind: "normal";
      from: KeyId;
      to: KeyId;
      /** Radius of the bends at both ends of the curve. */
      arcRadius: number;
      /** +1 when the strip leaves the left key towards its top edge. */
      arcSide: 1 | -1;
      curve: CurveSegment;
    }
  | {
      kind: "side";
      from: KeyId;
      to: KeyId;
      start: RigidTransform;
      segment: KeySegment;
      lateral: number;
    };

export interface ClusterConnector {
  from: KeyId;
  to: KeyId;
  curve: CurveSegment;
}

export interface FpcPad {
  position: RigidTransform;
  anchor: BoardAnchor;
}

/** Everything the board generator needs; derived from a layout alone. */
export interface WiringLayout {
  /** Key the board frame is attached to. */
  referenceKey: KeyId;
  keys: WiredKey[];
  rowNets: string[];
  columnNets: string[];
  keyConnectors: KeyConnector[];
  columnConnectors: ColumnConnector[];
  clusterConnector: ClusterConnector;
  fpcPad: FpcPad;
}
