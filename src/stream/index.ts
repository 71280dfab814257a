export * from "./factory.js";
export * from "./xml-stream.js";
