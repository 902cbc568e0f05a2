/**
 * Logger Tests
 */

import { describe, it, beforeEach, afterEach, mock } from "node:test";
import assert from "node:assert";
import { createLogger, isLogLevel } from "../src/logger";

describe("createLogger", () => {
  let errorCalls: unknown[][];
  let warnCalls: unknown[][];

  beforeEach(() => {
    errorCalls = [];
    warnCalls = [];
    mock.method(console, "error", (...args: unknown[]) => {
      errorCalls.push(args);
    });
    mock.method(console, "warn", (...args: unknown[]) => {
      warnCalls.push(args);
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it("prefixes messages with the scope", () => {
    const log = createLogger("serial", "debug");
    log.debug("-> M105");
    assert.deepStrictEqual(errorCalls, [["[tempdeck:serial]", "-> M105"]]);
  });

  it("drops messages below the level", () => {
    const log = createLogger("cli", "warn");
    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");
    log.error("shown too");

    assert.deepStrictEqual(warnCalls, [["[tempdeck:cli]", "shown"]]);
    assert.deepStrictEqual(errorCalls, [["[tempdeck:cli]", "shown too"]]);
  });

  it("drops everything when silent", () => {
    const log = createLogger("cli", "silent");
    log.error("nope");
    assert.deepStrictEqual(errorCalls, []);
  });
});

describe("isLogLevel", () => {
  it("recognises the known levels only", () => {
    assert.strictEqual(isLogLevel("info"), true);
    assert.strictEqual(isLogLevel("silent"), true);
    assert.strictEqual(isLogLevel("verbose"), false);
    assert.strictEqual(isLogLevel("toString"), false);
  });
});
