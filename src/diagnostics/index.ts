export * from "./categories.js";
export * from "./classifier.js";
export * from "./reporter.js";
export * from "./runner.js";
export * from "./types.js";
