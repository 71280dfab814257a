export const XMLSTREAM_VERSION = "0.1.0";

export * from "./core/errors.js";
export * from "./core/log.js";
export * from "./core/options.js";
export type * from "./core/types.js";
export * from "./dispatch/index.js";
export * from "./xml/index.js";
export * from "./stream/index.js";
export * from "./transport/index.js";
