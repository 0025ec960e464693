export * from "./types.js";
export * from "./errors.js";
export * from "./grid.js";
export * from "./sample.js";
export * from "./tetrahedra.js";
export * from "./normals.js";
export * from "./topology.js";
export * from "./stl.js";
export * from "./worker-pool.js";
export * from "./mesh.js";
