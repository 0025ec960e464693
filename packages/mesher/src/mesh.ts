import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { isDegenerateBounds, type Bounds } from "@keyshell/core";
import { compileSolid, type ImplicitSolid, type SdfFunction } from "@keyshell/sdf";
import { MeshError } from "./errors.js";
import { createGrid, sampleCount, slabs } from "./grid.js";
import { NORMAL_PROBE, vertexNormals } from "./normals.js";
import { closeBoundary, sampleSlab } from "./sample.js";
import { extractSurface } from "./tetrahedra.js";
import { checkTopology } from "./topology.js";
import type { Mesh, MeshCostEstimate, SampleGrid } from "./types.js";
import type { MesherWorkerPool } from "./worker-pool.js";

/** Above this many samples a regeneration takes seconds rather than a blink. */
export const INTERACTIVE_SAMPLE_LIMIT = 8_000_000;
export const DEFAULT_MAX_SAMPLES = 120_000_000;

const BLOCK_LAYERS_PER_SLAB = 2;
const VERTICES_PER_NORMALS_TASK = 1 << 16;

export interface MeshOptions {
  /** Spreads sampling over worker threads; without it everything runs on the calling thread. */
  pool?: MesherWorkerPool;
  /** Polled between work units. Returning true abandons the run. */
  isCancelled?: () => boolean;
  maxSamples?: number;
}

export type MeshOutcome =
  | { status: "done"; mesh: Mesh }
  | { status: "failed"; error: MeshError }
  | { status: "cancelled" };

function checkInput(bounds: Bounds, resolution: number, maxSamples: number): SampleGrid | MeshError {
  if (!Number.isFinite(resolution) || resolution <= 0) {
    return new MeshError("invalid-resolution", `Resolution must be a positive number, got ${resolution}`);
  }
  if (isDegenerateBounds(bounds)) {
    return new MeshError("degenerate-bounds", "Solid bounds are empty or not finite");
  }
  const grid = createGrid(bounds, resolution);
  const samples = sampleCount(grid);
  if (samples > maxSamples) {
    return new MeshError(
      "sample-limit",
      `Resolution ${resolution} needs ${samples} samples, more than the limit of ${maxSamples}`
    );
  }
  return grid;
}

/** Sample count and responsiveness of meshing `bounds` at `resolution`. */
export function estimateMeshCost(bounds: Bounds, resolution: number): MeshCostEstimate {
  if (!Number.isFinite(resolution) || resolution <= 0 || isDegenerateBounds(bounds)) {
    return { samples: 0, grid: { nx: 0, ny: 0, nz: 0 }, interactive: false };
  }
  const { nx, ny, nz } = createGrid(bounds, resolution);
  const samples = nx * ny * nz;
  return { samples, grid: { nx, ny, nz }, interactive: samples <= INTERACTIVE_SAMPLE_LIMIT };
}

class Cancelled {}

/** Runs `count` units with at most `window` in flight; stops handing out units once cancelled. */
async function runUnits(
  count: number,
  window: number,
  isCancelled: () => boolean,
  unit: (index: number) => Promise<void>
): Promise<void> {
  const inFlight = new Set<Promise<void>>();
  const state: { failure?: { error: unknown } } = {};

  for (let index = 0; index < count; index++) {
    if (state.failure) break;
    if (isCancelled()) throw new Cancelled();
    const settled: Promise<void> = unit(index)
      .catch((error: unknown) => {
        state.failure = state.failure ?? { error };
      })
      .finally(() => {
        inFlight.delete(settled);
      });
    inFlight.add(settled);
    if (inFlight.size >= window) {
      await Promise.race(inFlight);
    }
  }
  await Promise.all(inFlight);
  if (state.failure) throw state.failure.error;
  if (isCancelled()) throw new Cancelled();
}

async function sampleField(
  solid: ImplicitSolid,
  fn: SdfFunction,
  grid: SampleGrid,
  options: MeshOptions,
  isCancelled: () => boolean
): Promise<Float32Array> {
  const values = new Float32Array(sampleCount(grid));
  const layer = grid.nx * grid.ny;
  const parts = slabs(grid, BLOCK_LAYERS_PER_SLAB);
  const pool = options.pool;

  await runUnits(parts.length, pool ? pool.size * 2 : 1, isCancelled, async (index) => {
    const { zStart, zEnd } = parts[index];
    if (pool) {
      values.set(await pool.sample(solid, { grid, zStart, zEnd }), zStart * layer);
    } else {
      values.set(sampleSlab(fn, grid, zStart, zEnd), zStart * layer);
      await yieldToEventLoop();
    }
  });
  closeBoundary(values, grid);
  return values;
}

async function computeNormals(
  solid: ImplicitSolid,
  fn: SdfFunction,
  positions: Float32Array,
  probe: number,
  options: MeshOptions,
  isCancelled: () => boolean
): Promise<Float32Array> {
  const normals = new Float32Array(positions.length);
  const stride = VERTICES_PER_NORMALS_TASK * 3;
  const count = Math.ceil(positions.length / stride);
  const pool = options.pool;

  await runUnits(count, pool ? pool.size * 2 : 1, isCancelled, async (index) => {
    const part = positions.slice(index * stride, (index + 1) * stride);
    if (pool) {
      normals.set(await pool.normals(solid, { positions: part, probe }), index * stride);
    } else {
      normals.set(vertexNormals(fn, part, probe), index * stride);
      await yieldToEventLoop();
    }
  });
  return normals;
}

/**
 * Extracts the zero level set of `solid` within its bounds as a closed
 * triangle mesh with lattice spacing `resolution`.
 *
 * Input problems are reported before any sampling starts. The result does
 * not depend on whether or how many worker threads are used.
 */
export async function mesh(solid: ImplicitSolid, resolution: number, options: MeshOptions = {}): Promise<MeshOutcome> {
  const checked = checkInput(solid.bounds, resolution, options.maxSamples ?? DEFAULT_MAX_SAMPLES);
  if (checked instanceof MeshError) {
    return { status: "failed", error: checked };
  }
  const grid = checked;
  const isCancelled = options.isCancelled ?? (() => false);
  const fn = compileSolid(solid);

  try {
    const values = await sampleField(solid, fn, grid, options, isCancelled);
    const { positions, indices } = extractSurface(values, grid);
    if (indices.length === 0) {
      return { status: "failed", error: new MeshError("empty-surface", "The solid has no surface inside its bounds") };
    }

    const topology = checkTopology(indices, positions.length / 3);
    if (!topology.watertight) {
      return {
        status: "failed",
        error: new MeshError(
          "non-manifold",
          `Mesh is not closed: ${topology.boundaryEdges} open, ${topology.overusedEdges} overused and ${topology.flippedEdges} flipped edges`
        )
      };
    }

    if (isCancelled()) {
      return { status: "cancelled" };
    }
    const normals = await computeNormals(solid, fn, positions, grid.step * NORMAL_PROBE, options, isCancelled);
    return { status: "done", mesh: { positions, normals, indices } };
  } catch (error) {
    if (error instanceof Cancelled) {
      return { status: "cancelled" };
    }
    throw error;
  }
}
