import { boundsCenter, type Bounds } from "@keyshell/core";
import type { SampleGrid } from "./types.js";

/** Samples per block edge used for coarse skipping. */
export const BLOCK_SIZE = 4;

/**
 * Lattice covering `bounds` with cells of edge `step`, padded by at least
 * one cell on every side so the outermost samples lie outside the solid.
 */
export function createGrid(bounds: Bounds, step: number): SampleGrid {
  const center = boundsCenter(bounds);
  const cells = (size: number): number => Math.ceil(size / step) + 2;
  const cx = cells(bounds.dx);
  const cy = cells(bounds.dy);
  const cz = cells(bounds.dz);
  return {
    origin: {
      x: center.x - (cx * step) / 2,
      y: center.y - (cy * step) / 2,
      z: center.z - (cz * step) / 2
    },
    step,
    nx: cx + 1,
    ny: cy + 1,
    nz: cz + 1
  };
}

export function sampleCount(grid: SampleGrid): number {
  return grid.nx * grid.ny * grid.nz;
}

export function sampleIndex(grid: SampleGrid, i: number, j: number, k: number): number {
  return i + grid.nx * (j + grid.ny * k);
}

/** Splits the z layers into slabs of whole blocks, `blocksPerSlab` block layers each. */
export function slabs(grid: SampleGrid, blocksPerSlab: number): Array<{ zStart: number; zEnd: number }> {
  const height = BLOCK_SIZE * Math.max(1, blocksPerSlab);
  const out: Array<{ zStart: number; zEnd: number }> = [];
  for (let z = 0; z < grid.nz; z += height) {
    out.push({ zStart: z, zEnd: Math.min(grid.nz, z + height) });
  }
  return out;
}
