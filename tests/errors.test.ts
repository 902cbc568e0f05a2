/**
 * Error Taxonomy Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import {
  TempdeckError,
  deviceNotFound,
  invalidResponse,
  isTempdeckError,
  responseTimeout,
} from "../src/errors";

describe("TempdeckError", () => {
  it("carries a kind callers can switch on", () => {
    const kinds = [deviceNotFound("none"), responseTimeout(), invalidResponse("bad", "C:x")].map(
      (e) => e.kind
    );
    assert.deepStrictEqual(kinds, ["device_not_found", "response_timeout", "invalid_response"]);
  });

  it("keeps the offending response text", () => {
    const err = invalidResponse("Couldn't parse", "C:abc T:none");
    assert.strictEqual(err.response, "C:abc T:none");
    assert.deepStrictEqual(err.toJSON(), {
      name: "TempdeckError",
      kind: "invalid_response",
      message: "Couldn't parse",
      response: "C:abc T:none",
    });
  });

  it("is an Error", () => {
    const err = responseTimeout();
    assert.ok(err instanceof Error);
    assert.strictEqual(err.name, "TempdeckError");
  });
});

describe("isTempdeckError", () => {
  it("matches any kind when none is given", () => {
    assert.strictEqual(isTempdeckError(responseTimeout()), true);
  });

  it("matches a specific kind", () => {
    assert.strictEqual(isTempdeckError(deviceNotFound("x"), "device_not_found"), true);
    assert.strictEqual(isTempdeckError(deviceNotFound("x"), "response_timeout"), false);
  });

  it("does not match errors from elsewhere", () => {
    assert.strictEqual(isTempdeckError(new Error("Port is not open")), false);
    assert.strictEqual(isTempdeckError("invalid_response"), false);
    assert.strictEqual(new TempdeckError("invalid_response", "x") instanceof TempdeckError, true);
  });
});
