import assert from "node:assert/strict";
import { test } from "vitest";

import {
  BootstrapMixin,
  EventDispatcher,
  IncrementalXmlParser,
  XMLSTREAM_VERSION,
  XmlStream,
  XmlStreamFactory,
  connectSocket,
  serializeElement,
} from "../../src/index.js";

test("XMLSTREAM_VERSION is exported", () => {
  assert.equal(XMLSTREAM_VERSION, "0.1.0");
});

test("index exports the top-level API", () => {
  assert.equal(typeof EventDispatcher, "function");
  assert.equal(typeof BootstrapMixin, "function");
  assert.equal(typeof IncrementalXmlParser, "function");
  assert.equal(typeof XmlStream, "function");
  assert.equal(typeof XmlStreamFactory, "function");
  assert.equal(typeof connectSocket, "function");
  assert.equal(typeof serializeElement, "function");
});
