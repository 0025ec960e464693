import { gradient, type SdfFunction } from "@keyshell/sdf";

/** Gradient probe distance as a fraction of the grid step. */
export const NORMAL_PROBE = 0.25;

export function vertexNormals(fn: SdfFunction, positions: Float32Array, probe: number): Float32Array {
  const normals = new Float32Array(positions.length);
  for (let i = 0; i < positions.length; i += 3) {
    const n = gradient(fn, positions[i], positions[i + 1], positions[i + 2], probe);
    normals[i] = n.x;
    normals[i + 1] = n.y;
    normals[i + 2] = n.z;
  }
  return normals;
}
