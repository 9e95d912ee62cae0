export * from "./check-wire.js";
export * from "./loopback.js";
export * from "./report.js";
export * from "./codec.js";
