import type { TopologyReport } from "./types.js";

function sortedKeys(indices: Uint32Array, vertexCount: number, directed: boolean): Float64Array {
  const keys = new Float64Array(indices.length);
  for (let t = 0; t < indices.length; t += 3) {
    for (let e = 0; e < 3; e++) {
      const a = indices[t + e];
      const b = indices[t + ((e + 1) % 3)];
      keys[t + e] = directed || a < b ? a * vertexCount + b : b * vertexCount + a;
    }
  }
  return keys.sort();
}

/** Counts how often each edge is used. A closed surface uses every edge exactly twice, once per direction. */
export function checkTopology(indices: Uint32Array, vertexCount: number): TopologyReport {
  const undirected = sortedKeys(indices, vertexCount, false);
  let edges = 0;
  let boundaryEdges = 0;
  let overusedEdges = 0;
  for (let start = 0; start < undirected.length; ) {
    let end = start + 1;
    while (end < undirected.length && undirected[end] === undirected[start]) end++;
    edges++;
    const uses = end - start;
    if (uses === 1) boundaryEdges++;
    else if (uses > 2) overusedEdges++;
    start = end;
  }

  const directed = sortedKeys(indices, vertexCount, true);
  let flippedEdges = 0;
  for (let i = 1; i < directed.length; i++) {
    if (directed[i] === directed[i - 1]) flippedEdges++;
  }

  return {
    edges,
    boundaryEdges,
    overusedEdges,
    flippedEdges,
    watertight: indices.length > 0 && boundaryEdges === 0 && overusedEdges === 0 && flippedEdges === 0
  };
}
