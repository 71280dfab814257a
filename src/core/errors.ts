import type { SourceLocation, XmlStreamErrorCode } from "./types.js";

export class XmlStreamError extends Error {
  readonly code: XmlStreamErrorCode;
  readonly location?: SourceLocation;

  constructor(code: XmlStreamErrorCode, message: string, location?: SourceLocation) {
    super(message);
    this.name = "XmlStreamError";
    this.code = code;
    this.location = location;
  }
}

export const isParseFailure = (value: unknown): value is XmlStreamError => {
  return (
    value instanceof XmlStreamError &&
    (value.code === "XML_PARSE_ERROR" || value.code === "XML_ENCODING_ERROR")
  );
};
