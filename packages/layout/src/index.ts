export * from "./types.js";
export * from "./constants.js";
export * from "./columns.js";
export * from "./thumb-keys.js";
export * from "./outline.js";
export * from "./solve.js";
