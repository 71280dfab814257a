import { SaxesParser, type SaxesTagNS } from "saxes";
import { TextDecoder } from "node:util";

import { XmlStreamError } from "../core/errors.js";
import type { SourceLocation } from "../core/types.js";
import { appendChild, appendText, createElement, type XmlElementNode } from "./element.js";

export type ParseOutcome =
  | { kind: "rootOpened"; root: XmlElementNode }
  | { kind: "childCompleted"; element: XmlElementNode }
  | { kind: "rootClosed"; root: XmlElementNode }
  | { kind: "failure"; error: XmlStreamError };

type StreamSaxesParser = SaxesParser<{ xmlns: true }>;

const MISMATCHED_CLOSE_MESSAGE = "unexpected close tag";

const normalizeLoc = (line: number, column: number): SourceLocation => {
  return {
    line: Math.max(1, line),
    column: Math.max(1, column),
  };
};

const toElement = (tag: SaxesTagNS): XmlElementNode => {
  const attributes: Record<string, string> = {};
  for (const [name, attribute] of Object.entries(tag.attributes)) {
    attributes[name] = attribute.value;
  }
  return createElement(tag.name, attributes, tag.uri === "" ? null : tag.uri);
};

/**
 * Feeds chunks of a single unbounded document to saxes and reports the
 * structure a stream protocol cares about: the root start tag, each completed
 * direct child of the root, and the root end tag. Deeper elements are only
 * reachable through the child that contains them.
 *
 * The first tokenizer error is terminal: it is reported as a `failure`
 * outcome and every later `feed` returns that same failure without parsing.
 */
export class IncrementalXmlParser {
  private parser: StreamSaxesParser;
  private decoder: TextDecoder;
  private stack: XmlElementNode[] = [];
  private root: XmlElementNode | null = null;
  private pending: ParseOutcome[] = [];
  private failure: XmlStreamError | null = null;
  private lastClosed: ParseOutcome | null = null;

  constructor() {
    this.decoder = IncrementalXmlParser.createDecoder();
    this.parser = this.createParser();
  }

  get failed(): boolean {
    return this.failure !== null;
  }

  /** Number of currently open elements, the root included. */
  get depth(): number {
    return this.stack.length;
  }

  reset(): void {
    this.decoder = IncrementalXmlParser.createDecoder();
    this.parser = this.createParser();
    this.stack = [];
    this.root = null;
    this.pending = [];
    this.failure = null;
    this.lastClosed = null;
  }

  /**
   * Decodes a chunk without parsing it; text passes through unchanged. Invalid
   * UTF-8 fails the parser like any other malformed input.
   */
  decode(chunk: string | Uint8Array): string | XmlStreamError {
    if (this.failure) {
      return this.failure;
    }
    if (typeof chunk === "string") {
      return chunk;
    }
    try {
      return this.decoder.decode(chunk, { stream: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Invalid UTF-8 input.";
      this.failure = new XmlStreamError("XML_ENCODING_ERROR", message, this.currentLocation());
      return this.failure;
    }
  }

  feed(chunk: string | Uint8Array): ParseOutcome[] {
    const decoded = this.decode(chunk);
    if (typeof decoded !== "string") {
      return [{ kind: "failure", error: decoded }];
    }
    return this.feedText(decoded);
  }

  feedText(text: string): ParseOutcome[] {
    if (this.failure) {
      return [{ kind: "failure", error: this.failure }];
    }
    if (text.length > 0) {
      this.parser.write(text);
    }
    const outcomes = this.pending;
    this.pending = [];
    return outcomes;
  }

  private currentLocation(): SourceLocation {
    return normalizeLoc(this.parser.line, this.parser.column);
  }

  private static createDecoder(): TextDecoder {
    return new TextDecoder("utf-8", { fatal: true });
  }

  private createParser(): StreamSaxesParser {
    const parser = new SaxesParser<{ xmlns: true }>({ xmlns: true });

    parser.on("error", (error) => {
      if (this.failure) {
        return;
      }
      // saxes pops and reports the open element before rejecting a mismatched
      // end tag, so that element was never really closed.
      if (
        this.lastClosed !== null &&
        error.message.includes(MISMATCHED_CLOSE_MESSAGE) &&
        this.pending[this.pending.length - 1] === this.lastClosed
      ) {
        this.pending.pop();
      }
      this.failure = new XmlStreamError("XML_PARSE_ERROR", error.message, this.currentLocation());
      this.pending.push({ kind: "failure", error: this.failure });
    });

    parser.on("opentag", (tag) => {
      if (this.failure) {
        return;
      }
      this.lastClosed = null;
      const node = toElement(tag);
      const parent = this.stack[this.stack.length - 1];
      this.stack.push(node);
      if (!parent) {
        this.root = node;
        this.pending.push({ kind: "rootOpened", root: node });
        return;
      }
      // The root only frames the stream; its children are handed out, not kept.
      if (parent !== this.root) {
        appendChild(parent, node);
      }
    });

    parser.on("text", (value) => {
      this.appendCharacterData(value);
    });

    parser.on("cdata", (value) => {
      this.appendCharacterData(value);
    });

    parser.on("closetag", () => {
      if (this.failure) {
        return;
      }
      const node = this.stack.pop();
      if (!node) {
        return;
      }
      this.lastClosed = null;
      if (this.stack.length === 0) {
        this.lastClosed = { kind: "rootClosed", root: node };
      } else if (this.stack.length === 1) {
        this.lastClosed = { kind: "childCompleted", element: node };
      }
      if (this.lastClosed) {
        this.pending.push(this.lastClosed);
      }
    });

    return parser;
  }

  private appendCharacterData(value: string): void {
    this.lastClosed = null;
    if (this.failure || this.stack.length < 2) {
      return;
    }
    appendText(this.stack[this.stack.length - 1], value);
  }
}
