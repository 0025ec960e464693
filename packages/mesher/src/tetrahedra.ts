import type { SampleGrid } from "./types.js";

/** Pair of tetrahedron corners (0..3) whose edge carries a surface vertex. */
type TetEdge = readonly [number, number];
type TetTriangle = readonly [TetEdge, TetEdge, TetEdge];

function isEven(permutation: readonly number[]): boolean {
  let inversions = 0;
  for (let i = 0; i < permutation.length; i++) {
    for (let j = i + 1; j < permutation.length; j++) {
      if (permutation[i] > permutation[j]) inversions++;
    }
  }
  return inversions % 2 === 0;
}

function permutations(items: readonly number[]): number[][] {
  if (items.length <= 1) {
    return [[...items]];
  }
  return items.flatMap((item, i) =>
    permutations([...items.slice(0, i), ...items.slice(i + 1)]).map((rest) => [item, ...rest])
  );
}

/**
 * Triangles per inside-corner mask of a positively oriented tetrahedron,
 * wound so their normals point from the inside corners to the outside ones.
 * Relabelling corners by an even permutation keeps the orientation, so each
 * case is written once for corner order (a, b, c, d).
 */
function buildCaseTable(): TetTriangle[][] {
  const table: TetTriangle[][] = Array.from({ length: 16 }, () => []);
  for (const [a, b, c, d] of permutations([0, 1, 2, 3]).filter(isEven)) {
    const single = 1 << a;
    if (table[single].length === 0) {
      table[single] = [[[a, b], [a, c], [a, d]]];
    }
    const allButOne = 15 & ~single;
    if (table[allButOne].length === 0) {
      table[allButOne] = [[[a, b], [a, d], [a, c]]];
    }
    const pair = (1 << a) | (1 << b);
    if (table[pair].length === 0) {
      table[pair] = [
        [[a, c], [a, d], [b, d]],
        [[a, c], [b, d], [b, c]]
      ];
    }
  }
  return table;
}

const CASES = buildCaseTable();

/**
 * Six tetrahedra per cube along the main diagonal, corners as cube corner
 * bits (x = 1, y = 2, z = 4). Every cube is split the same way, so shared
 * faces are split along the same diagonal and all tetrahedra have positive
 * volume.
 */
const CUBE_TETRAHEDRA: ReadonlyArray<readonly [number, number, number, number]> = permutations([0, 1, 2]).map(
  (axes): readonly [number, number, number, number] => {
    const a = 1 << axes[0];
    const ab = a | (1 << axes[1]);
    return isEven(axes) ? [0, a, ab, 7] : [0, a, 7, ab];
  }
);

/**
 * Marching tetrahedra over the sampled field. Samples below zero are inside.
 * Vertices on a lattice edge are shared by every triangle touching that
 * edge, so a closed sign pattern yields a closed, consistently wound mesh.
 */
export function extractSurface(values: Float32Array, grid: SampleGrid): { positions: Float32Array; indices: Uint32Array } {
  const { nx, ny, nz, step, origin } = grid;
  const layerStride = nx * ny;
  const cornerOffsets = Array.from({ length: 8 }, (_, c) => (c & 1) + nx * (((c >> 1) & 1) + ny * ((c >> 2) & 1)));

  // Vertex ids per lattice edge, keyed by the lower sample and one of seven directions.
  // Two z layers are live at a time.
  const caches = [new Int32Array(layerStride * 7).fill(-1), new Int32Array(layerStride * 7).fill(-1)];
  const positions: number[] = [];
  const indices: number[] = [];

  let i = 0;
  let j = 0;
  let k = 0;
  let base = 0;

  const vertexOn = (u: number, v: number): number => {
    const lo = (u & v) === u ? u : v;
    const hi = lo === u ? v : u;
    const direction = lo ^ hi;
    const si = i + (lo & 1);
    const sj = j + ((lo >> 1) & 1);
    const sk = k + ((lo >> 2) & 1);
    const cache = caches[sk & 1];
    const key = (sj * nx + si) * 7 + direction - 1;
    const cached = cache[key];
    if (cached >= 0) {
      return cached;
    }

    const a = values[base + cornerOffsets[lo]];
    const b = values[base + cornerOffsets[hi]];
    const t = a / (a - b);
    const id = positions.length / 3;
    positions.push(
      origin.x + (si + t * (direction & 1)) * step,
      origin.y + (sj + t * ((direction >> 1) & 1)) * step,
      origin.z + (sk + t * ((direction >> 2) & 1)) * step
    );
    cache[key] = id;
    return id;
  };

  for (k = 0; k < nz - 1; k++) {
    caches[(k + 1) & 1].fill(-1);
    for (j = 0; j < ny - 1; j++) {
      for (i = 0; i < nx - 1; i++) {
        base = i + nx * (j + ny * k);
        let cubeMask = 0;
        for (let c = 0; c < 8; c++) {
          if (values[base + cornerOffsets[c]] < 0) cubeMask |= 1 << c;
        }
        if (cubeMask === 0 || cubeMask === 255) continue;

        for (const tet of CUBE_TETRAHEDRA) {
          let mask = 0;
          for (let t = 0; t < 4; t++) {
            if (cubeMask & (1 << tet[t])) mask |= 1 << t;
          }
          for (const triangle of CASES[mask]) {
            for (const [p, q] of triangle) {
              indices.push(vertexOn(tet[p], tet[q]));
            }
          }
        }
      }
    }
  }

  return { positions: Float32Array.from(positions), indices: Uint32Array.from(indices) };
}
