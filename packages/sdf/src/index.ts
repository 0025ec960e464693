export * from "./nodes.js";
export * from "./distance.js";
export * from "./builder.js";
export * from "./compile.js";
