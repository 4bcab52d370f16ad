export * from "./collector.js";
export * from "./estimator.js";
export * from "./recommendations.js";
export * from "./scoring.js";
export * from "./types.js";
