import type { SdfFunction } from "@keyshell/sdf";
import { BLOCK_SIZE } from "./grid.js";
import type { SampleGrid } from "./types.js";

/**
 * A block whose center lies further from the surface than this many half
 * diagonals is filled with the center value. The slack covers the steeper
 * gradients of the rounded operators.
 */
const SKIP_FACTOR = 1.5;

/**
 * Samples z layers `zStart..zEnd` of the grid. `zStart` must sit on a block
 * boundary so every caller visits the same blocks.
 */
export function sampleSlab(fn: SdfFunction, grid: SampleGrid, zStart: number, zEnd: number): Float32Array {
  if (zStart % BLOCK_SIZE !== 0) {
    throw new Error(`Slab start ${zStart} is not aligned to the block size`);
  }
  const { nx, ny, step, origin } = grid;
  const layer = nx * ny;
  const values = new Float32Array(layer * (zEnd - zStart));

  for (let k0 = zStart; k0 < zEnd; k0 += BLOCK_SIZE) {
    const k1 = Math.min(zEnd, k0 + BLOCK_SIZE);
    for (let j0 = 0; j0 < ny; j0 += BLOCK_SIZE) {
      const j1 = Math.min(ny, j0 + BLOCK_SIZE);
      for (let i0 = 0; i0 < nx; i0 += BLOCK_SIZE) {
        const i1 = Math.min(nx, i0 + BLOCK_SIZE);

        const cx = origin.x + ((i0 + i1 - 1) / 2) * step;
        const cy = origin.y + ((j0 + j1 - 1) / 2) * step;
        const cz = origin.z + ((k0 + k1 - 1) / 2) * step;
        const halfDiagonal = (step * Math.hypot(i1 - i0 - 1, j1 - j0 - 1, k1 - k0 - 1)) / 2;
        const center = fn(cx, cy, cz);
        const skip = Math.abs(center) > SKIP_FACTOR * halfDiagonal + 3 * step;

        for (let k = k0; k < k1; k++) {
          const z = origin.z + k * step;
          for (let j = j0; j < j1; j++) {
            const y = origin.y + j * step;
            let index = (k - zStart) * layer + j * nx + i0;
            for (let i = i0; i < i1; i++, index++) {
              values[index] = skip ? center : fn(origin.x + i * step, y, z);
            }
          }
        }
      }
    }
  }
  return values;
}

/** Raises every sample on the outer faces of the lattice above zero. */
export function closeBoundary(values: Float32Array, grid: SampleGrid): void {
  const { nx, ny, nz, step } = grid;
  const lift = (index: number): void => {
    if (!(values[index] > 0)) {
      values[index] = step;
    }
  };
  for (let k = 0; k < nz; k++) {
    for (let j = 0; j < ny; j++) {
      const row = nx * (j + ny * k);
      if (k === 0 || k === nz - 1 || j === 0 || j === ny - 1) {
        for (let i = 0; i < nx; i++) lift(row + i);
      } else {
        lift(row);
        lift(row + nx - 1);
      }
    }
  }
}
