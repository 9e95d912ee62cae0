export * from "./result.js";
export * from "./config.js";
export * from "./trace.js";
export * from "./types/index.js";
export * from "./diagnostics/index.js";
export * from "./wire/index.js";
export * from "./canonicalize/ports.js";
