import { XmlStreamError } from "../core/errors.js";
import { resolveXmlStreamOptions, type ResolvedXmlStreamOptions, type XmlStreamOptions } from "../core/options.js";
import type { StreamState, Transport } from "../core/types.js";
import type { BootstrapMixin } from "../dispatch/bootstrap.js";
import { EventDispatcher } from "../dispatch/event-dispatcher.js";
import { isXmlElement, type XmlElementNode } from "../xml/element.js";
import { IncrementalXmlParser, type ParseOutcome } from "../xml/incremental-parser.js";
import { serializeElement } from "../xml/serialize.js";

export const STREAM_CONNECTED_EVENT = "stream-connected";
export const STREAM_START_EVENT = "stream-start";
export const STREAM_ELEMENT_EVENT = "stream-element";
export const STREAM_ERROR_EVENT = "stream-error";
export const STREAM_END_EVENT = "stream-end";

/** Selector a completed top-level element is dispatched under, e.g. `/message`. */
export const elementSelector = (element: XmlElementNode): string => `/${element.name}`;

const encoder = new TextEncoder();

/**
 * One XML stream over one connection: a single root element that stays open
 * for the life of the connection, with top-level children as the units of
 * exchange.
 *
 * Lifecycle: `idle` until `connectionMade`, `awaitingRoot` until the root start
 * tag arrives, then `inStream`. A parse failure passes through `errored` (while
 * `stream-error` observers run) to `ended`; `connectionLost` ends the stream from
 * any state. `stream-end` fires exactly once.
 */
export class XmlStream extends EventDispatcher {
  transport: Transport | null = null;
  factory: BootstrapMixin | null = null;

  private readonly options: ResolvedXmlStreamOptions;
  private readonly parser = new IncrementalXmlParser();
  private currentState: StreamState = "idle";
  private queue: ParseOutcome[] = [];
  private draining = false;

  constructor(options?: XmlStreamOptions) {
    super();
    this.options = resolveXmlStreamOptions(options);
  }

  get state(): StreamState {
    return this.currentState;
  }

  makeConnection(transport: Transport): void {
    this.transport = transport;
    this.connectionMade();
  }

  connectionMade(): void {
    if (this.currentState !== "idle") {
      throw new XmlStreamError(
        "STREAM_ALREADY_CONNECTED",
        `Cannot connect a stream in state "${this.currentState}".`
      );
    }
    this.parser.reset();
    this.currentState = "awaitingRoot";
    this.options.log("STREAM:CONNECTED");
    this.dispatch(this, STREAM_CONNECTED_EVENT);
  }

  dataReceived(data: string | Uint8Array): void {
    if (this.currentState === "idle") {
      throw new XmlStreamError("STREAM_NOT_CONNECTED", "Data received before the connection was made.");
    }
    if (this.currentState === "ended") {
      return;
    }
    const text = this.parser.decode(data);
    if (typeof text !== "string") {
      this.queue.push({ kind: "failure", error: text });
      this.drainOutcomes();
      return;
    }
    this.queue.push(...this.parser.feedText(text));
    try {
      this.options.rawDataIn?.(text);
    } finally {
      this.drainOutcomes();
    }
  }

  connectionLost(reason: unknown = null): void {
    if (this.currentState === "ended") {
      return;
    }
    this.endStream(reason);
  }

  send(data: string | Uint8Array | XmlElementNode): void {
    if (this.currentState === "idle") {
      throw new XmlStreamError("STREAM_NOT_CONNECTED", "Cannot send before the connection was made.");
    }
    if (this.currentState === "ended") {
      throw new XmlStreamError("STREAM_ENDED", "Cannot send on an ended stream.");
    }
    if (!this.transport) {
      throw new XmlStreamError("STREAM_NO_TRANSPORT", "Stream has no transport attached.");
    }
    if (data instanceof Uint8Array) {
      this.options.rawDataOut?.(Buffer.from(data).toString("utf8"));
      this.transport.write(data);
      return;
    }
    const text = isXmlElement(data) ? serializeElement(data) : data;
    this.options.rawDataOut?.(text);
    this.transport.write(encoder.encode(text));
  }

  /**
   * Outcomes are delivered in parse order. A chunk received from inside an
   * observer only queues its outcomes; the outermost call delivers them.
   */
  private drainOutcomes(): void {
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      while (this.currentState !== "ended") {
        const outcome = this.queue.shift();
        if (!outcome) {
          return;
        }
        this.handleOutcome(outcome);
      }
    } finally {
      this.draining = false;
      if (this.currentState === "ended") {
        this.queue = [];
      }
    }
  }

  private handleOutcome(outcome: ParseOutcome): void {
    switch (outcome.kind) {
      case "rootOpened":
        this.currentState = "inStream";
        this.options.log(`STREAM:START ${outcome.root.name}`);
        this.dispatch(outcome.root, STREAM_START_EVENT);
        return;
      case "childCompleted":
        this.dispatch(outcome.element, elementSelector(outcome.element));
        this.dispatch(outcome.element, STREAM_ELEMENT_EVENT);
        return;
      case "rootClosed":
        this.transport?.loseConnection();
        return;
      case "failure":
        this.failStream(outcome.error);
        return;
    }
  }

  /**
   * `stream-end` must follow `stream-error` even when an error observer throws;
   * such an exception is rethrown once the stream has ended.
   */
  private failStream(error: XmlStreamError): void {
    this.currentState = "errored";
    this.options.log(`STREAM:ERROR ${error.code}`);
    let observerFailed = false;
    let observerError: unknown = null;
    try {
      this.dispatch(error, STREAM_ERROR_EVENT);
    } catch (caught) {
      observerFailed = true;
      observerError = caught;
    }
    try {
      this.endStream(error);
    } finally {
      this.transport?.loseConnection();
    }
    if (observerFailed) {
      throw observerError;
    }
  }

  private endStream(reason: unknown): void {
    this.currentState = "ended";
    this.options.log("STREAM:END");
    this.dispatch(reason, STREAM_END_EVENT);
  }
}
