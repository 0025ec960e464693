import type { Mesh } from "./types.js";

const HEADER_BYTES = 80;
const TRIANGLE_BYTES = 50;

/**
 * Binary STL: an 80 byte header, the triangle count, then per triangle the
 * facet normal, three corners and an empty attribute word. The facet normal
 * comes from the winding.
 */
export function encodeStl(mesh: Mesh, header = "keyshell"): Uint8Array {
  const { positions: p, indices } = mesh;
  const count = indices.length / 3;
  const bytes = new Uint8Array(HEADER_BYTES + 4 + count * TRIANGLE_BYTES);
  const view = new DataView(bytes.buffer);

  bytes.set(new TextEncoder().encode(header).subarray(0, HEADER_BYTES));
  view.setUint32(HEADER_BYTES, count, true);

  let offset = HEADER_BYTES + 4;
  for (let t = 0; t < indices.length; t += 3) {
    const a = indices[t] * 3;
    const b = indices[t + 1] * 3;
    const c = indices[t + 2] * 3;

    const ux = p[b] - p[a];
    const uy = p[b + 1] - p[a + 1];
    const uz = p[b + 2] - p[a + 2];
    const vx = p[c] - p[a];
    const vy = p[c + 1] - p[a + 1];
    const vz = p[c + 2] - p[a + 2];
    let nx = uy * vz - uz * vy;
    let ny = uz * vx - ux * vz;
    let nz = ux * vy - uy * vx;
    const length = Math.sqrt(nx * nx + ny * ny + nz * nz);
    if (length > 1e-12) {
      nx /= length;
      ny /= length;
      nz /= length;
    } else {
      nx = 0;
      ny = 0;
      nz = 0;
    }

    view.setFloat32(offset, nx, true);
    view.setFloat32(offset + 4, ny, true);
    view.setFloat32(offset + 8, nz, true);
    let corner = offset + 12;
    for (const v of [a, b, c]) {
      view.setFloat32(corner, p[v], true);
      view.setFloat32(corner + 4, p[v + 1], true);
      view.setFloat32(corner + 8, p[v + 2], true);
      corner += 12;
    }
    view.setUint16(offset + 48, 0, true);
    offset += TRIANGLE_BYTES;
  }
  return bytes;
}
