import assert from "node:assert/strict";
import { test } from "vitest";

import { XmlStreamError } from "../../../src/core/errors.js";
import { collectLog, silentLog } from "../../../src/core/log.js";
import { resolveXmlStreamOptions } from "../../../src/core/options.js";

test("resolveXmlStreamOptions fills defaults", () => {
  const resolved = resolveXmlStreamOptions();
  assert.equal(resolved.log, silentLog);
  assert.equal(resolved.rawDataIn, null);
  assert.equal(resolved.rawDataOut, null);
});

test("resolveXmlStreamOptions keeps provided hooks", () => {
  const lines: string[] = [];
  const log = collectLog(lines);
  const rawDataIn = () => {};
  const resolved = resolveXmlStreamOptions({ log, rawDataIn });
  assert.equal(resolved.log, log);
  assert.equal(resolved.rawDataIn, rawDataIn);
  resolved.log("STREAM:CONNECTED");
  assert.deepEqual(lines, ["STREAM:CONNECTED"]);
});

test("resolveXmlStreamOptions rejects non-function hooks", () => {
  assert.throws(
    () => resolveXmlStreamOptions({ rawDataOut: 42 as unknown as () => void }),
    (error: unknown) => {
      assert.ok(error instanceof XmlStreamError);
      assert.equal(error.code, "OPTIONS_INVALID");
      assert.equal(error.message, `Option "rawDataOut" must be a function.`);
      return true;
    }
  );
});
