import assert from "node:assert/strict";
import { test } from "vitest";

import * as dispatchExports from "../src/dispatch/index.js";
import { XMLSTREAM_VERSION } from "../src/index.js";
import * as streamExports from "../src/stream/index.js";
import * as transportExports from "../src/transport/index.js";
import * as xmlExports from "../src/xml/index.js";

test("exports version", () => {
  assert.equal(XMLSTREAM_VERSION, "0.1.0");
});

test("barrel exports are available", () => {
  assert.equal(typeof dispatchExports.EventDispatcher, "function");
  assert.equal(typeof dispatchExports.BootstrapMixin, "function");
  assert.equal(typeof xmlExports.IncrementalXmlParser, "function");
  assert.equal(typeof xmlExports.createElement, "function");
  assert.equal(typeof streamExports.XmlStream, "function");
  assert.equal(typeof streamExports.ProtocolFactory, "function");
  assert.equal(typeof transportExports.serveFactory, "function");
});
