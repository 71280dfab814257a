import { XmlStreamError } from "./errors.js";
import { silentLog } from "./log.js";
import type { RawDataHook, WriteLine } from "./types.js";

export interface XmlStreamOptions {
  /** Receives one `KEY:value` line per lifecycle transition. */
  log?: WriteLine;
  /** Sees every chunk handed to `dataReceived`, decoded to text. */
  rawDataIn?: RawDataHook;
  /** Sees every payload written by `send`, before encoding. */
  rawDataOut?: RawDataHook;
}

export interface ResolvedXmlStreamOptions {
  log: WriteLine;
  rawDataIn: RawDataHook | null;
  rawDataOut: RawDataHook | null;
}

const assertOptionalFunction = (name: string, value: unknown): void => {
  if (value !== undefined && typeof value !== "function") {
    throw new XmlStreamError("OPTIONS_INVALID", `Option "${name}" must be a function.`);
  }
};

export const resolveXmlStreamOptions = (
  options: XmlStreamOptions = {}
): ResolvedXmlStreamOptions => {
  assertOptionalFunction("log", options.log);
  assertOptionalFunction("rawDataIn", options.rawDataIn);
  assertOptionalFunction("rawDataOut", options.rawDataOut);
  return {
    log: options.log ?? silentLog,
    rawDataIn: options.rawDataIn ?? null,
    rawDataOut: options.rawDataOut ?? null,
  };
};
