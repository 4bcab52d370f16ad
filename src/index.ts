export * from "./core/index.js";
export * from "./diagnostics/index.js";
export * from "./quality/index.js";
export * from "./report/index.js";
