export * from "./types.js";
export * from "./generate.js";
export * from "./scheduler.js";
export * from "./fs.js";
