export * from "./canonical.js";
export * from "./builtins.js";
export * from "./alias.js";
export * from "./equality.js";
export * from "./pretty.js";
