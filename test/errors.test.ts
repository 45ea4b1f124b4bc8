import assert from "node:assert/strict";
import { describe, it } from "node:test";

import {
  FAILURE_REASON_CODES,
  TargetDialError,
  classifySocketError,
  failureReasonCode,
  failureReasonFromCode,
  isLinkFailure,
} from "../src/errors.js";

function errnoError(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`connect ${code}`);
  err.code = code;
  return err;
}

describe("failure reasons", () => {
  it("round-trips every wire code", () => {
    for (const [reason, code] of Object.entries(FAILURE_REASON_CODES)) {
      assert.equal(failureReasonFromCode(code), reason);
    }
    assert.equal(failureReasonCode("SessionLimit"), 9);
  });

  it("maps unknown codes to TargetReset", () => {
    assert.equal(failureReasonFromCode(0), "TargetReset");
    assert.equal(failureReasonFromCode(4242), "TargetReset");
  });

  it("only treats LinkLost and Shutdown as Link failures", () => {
    assert.equal(isLinkFailure("LinkLost"), true);
    assert.equal(isLinkFailure("Shutdown"), true);
    assert.equal(isLinkFailure("Timeout"), false);
  });
});

describe("classifySocketError", () => {
  it("maps errno codes to reasons", () => {
    assert.equal(classifySocketError(errnoError("ENOTFOUND")), "DNSFailure");
    assert.equal(classifySocketError(errnoError("EAI_AGAIN")), "DNSFailure");
    assert.equal(classifySocketError(errnoError("ECONNREFUSED")), "ConnectionRefused");
    assert.equal(classifySocketError(errnoError("ETIMEDOUT")), "Timeout");
    assert.equal(classifySocketError(errnoError("EHOSTUNREACH")), "TargetUnreachable");
    assert.equal(classifySocketError(errnoError("ECONNRESET")), "TargetReset");
    assert.equal(classifySocketError("not an error"), "TargetReset");
  });

  it("keeps the reason carried by a TargetDialError", () => {
    assert.equal(classifySocketError(new TargetDialError("PolicyDenied", "port 25 is not allowed")), "PolicyDenied");
  });
});
