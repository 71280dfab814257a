export interface SourceLocation {
  line: number;
  column: number;
}

export type XmlStreamErrorCode =
  | "XML_PARSE_ERROR"
  | "XML_ENCODING_ERROR"
  | "STREAM_NOT_CONNECTED"
  | "STREAM_ALREADY_CONNECTED"
  | "STREAM_ENDED"
  | "STREAM_NO_TRANSPORT"
  | "OPTIONS_INVALID";

export type StreamState = "idle" | "awaitingRoot" | "inStream" | "errored" | "ended";

export type Observer = (payload: unknown) => void;

export type WriteLine = (line: string) => void;

export type RawDataHook = (text: string) => void;

export interface Transport {
  write(data: Uint8Array): void;
  loseConnection(): void;
}

export interface ConnectionInfo {
  remoteAddress?: string;
  remotePort?: number;
}
