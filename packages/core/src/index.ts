export * from "./types.js";
export * from "./bounds.js";
export * from "./hash.js";
export * from "./transform.js";
