import type { Vec3 } from "@keyshell/core";

/** Indexed triangle mesh. Triangles wind counter-clockwise seen from outside. */
export interface Mesh {
  /** x, y, z per vertex. */
  positions: Float32Array;
  /** Unit normal per vertex, taken from the solid's gradient. */
  normals: Float32Array;
  /** Three vertex indices per triangle. */
  indices: Uint32Array;
}

/** Regular lattice of sample points. */
export interface SampleGrid {
  /** Position of sample (0, 0, 0). */
  origin: Vec3;
  /** Distance between neighbouring samples. */
  step: number;
  /** Sample counts per axis. */
  nx: number;
  ny: number;
  nz: number;
}

export interface MeshCostEstimate {
  samples: number;
  grid: { nx: number; ny: number; nz: number };
  /** False when regenerating at this resolution is too slow for live reload. */
  interactive: boolean;
}

export interface TopologyReport {
  edges: number;
  /** Edges used by one triangle only. */
  boundaryEdges: number;
  /** Edges used by more than two triangles. */
  overusedEdges: number;
  /** Directed edges used twice, i.e. neighbours with opposite winding. */
  flippedEdges: number;
  watertight: boolean;
}
