export * from "./element.js";
export * from "./incremental-parser.js";
export * from "./serialize.js";
