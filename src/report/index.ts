export * from "./json.js";
export * from "./markdown.js";
