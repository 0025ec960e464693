export * from "./types.js";
export * from "./constants.js";
export * from "./segments.js";
export * from "./connectors.js";
export * from "./derive.js";
