export * from "./types.js";
export * from "./constants.js";
export * from "./clearance.js";
export * from "./insert-holders.js";
export * from "./ports.js";
export * from "./build.js";
