export * from "./bootstrap.js";
export * from "./event-dispatcher.js";
