export * from "./types.js";
export * from "./defaults.js";
export * from "./errors.js";
export * from "./validate.js";
export * from "./parse.js";
