import assert from "node:assert/strict";
import { test } from "vitest";

import { collectLog } from "../../../src/core/log.js";
import type { BootstrapMixin } from "../../../src/dispatch/bootstrap.js";
import { EventDispatcher } from "../../../src/dispatch/event-dispatcher.js";
import { ProtocolFactory, XmlStreamFactory } from "../../../src/stream/factory.js";
import { XmlStream } from "../../../src/stream/xml-stream.js";

/** Protocol that only records its construction arguments. */
class DummyProtocol extends EventDispatcher {
  factory: BootstrapMixin | null = null;
  readonly args: unknown[];

  constructor(...args: unknown[]) {
    super();
    this.args = args;
  }
}

const makeFactories = () => [
  new XmlStreamFactory(),
  new ProtocolFactory<DummyProtocol, unknown[]>(DummyProtocol, null, { test: null }),
];

test("buildProtocol installs bootstraps on the protocol", () => {
  for (const factory of makeFactories()) {
    const called: unknown[] = [];
    factory.addBootstrap("//event/myevent", (data) => called.push(data));

    const protocol = factory.buildProtocol(null);
    protocol.dispatch(null, "//event/myevent");

    assert.deepEqual(called, [null]);
  }
});

test("buildProtocol stores the factory on the protocol", () => {
  for (const factory of makeFactories()) {
    const protocol = factory.buildProtocol(null);
    assert.equal(protocol.factory, factory);
  }
});

test("bootstraps removed from the factory are not installed", () => {
  for (const factory of makeFactories()) {
    const called: unknown[] = [];
    const observer = (data: unknown) => {
      called.push(data);
    };
    factory.addBootstrap("//event/myevent", observer);
    factory.removeBootstrap("//event/myevent", observer);

    const protocol = factory.buildProtocol(null);
    protocol.dispatch(null, "//event/myevent");
    assert.deepEqual(called, []);
  }
});

test("each build is an independent instance with the bootstraps current at call time", () => {
  const factory = new XmlStreamFactory();
  const calls: string[] = [];
  factory.addBootstrap("sel", () => calls.push("early"));
  const first = factory.buildProtocol();
  factory.addBootstrap("sel", () => calls.push("late"));
  const second = factory.buildProtocol();

  assert.notEqual(first, second);
  assert.ok(first instanceof XmlStream);
  first.dispatch(null, "sel");
  assert.deepEqual(calls, ["early"]);
  calls.length = 0;
  second.dispatch(null, "sel");
  assert.deepEqual(calls, ["early", "late"]);
});

test("construction arguments are passed to the protocol class", () => {
  const factory = new ProtocolFactory<DummyProtocol, unknown[]>(DummyProtocol, null, { test: null });
  const protocol = factory.buildProtocol(null);
  assert.deepEqual(protocol.args, [null, { test: null }]);
});

test("xml stream factory passes its options to every stream", () => {
  const lines: string[] = [];
  const factory = new XmlStreamFactory({ log: collectLog(lines) });
  const stream = factory.buildProtocol({ remoteAddress: "127.0.0.1", remotePort: 5222 });
  stream.makeConnection({ write: () => {}, loseConnection: () => {} });
  assert.deepEqual(lines, ["PROTOCOL_BUILT:127.0.0.1:5222", "STREAM:CONNECTED"]);
});

test("factory log reports connections without an address as NONE", () => {
  const lines: string[] = [];
  const factory = new ProtocolFactory<DummyProtocol, unknown[]>(DummyProtocol);
  factory.log = collectLog(lines);
  factory.buildProtocol({ remoteAddress: "10.0.0.2" });
  factory.buildProtocol(null);
  assert.deepEqual(lines, ["PROTOCOL_BUILT:10.0.0.2", "PROTOCOL_BUILT:NONE"]);
});

test("the protocol class can be swapped after construction", () => {
  const factory = new ProtocolFactory<DummyProtocol, unknown[]>(DummyProtocol, "arg");
  class OtherProtocol extends DummyProtocol {}
  factory.protocol = OtherProtocol;
  const protocol = factory.buildProtocol();
  assert.ok(protocol instanceof OtherProtocol);
  assert.deepEqual(protocol.args, ["arg"]);
});
