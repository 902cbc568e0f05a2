/**
 * Command Formatting Tests
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import {
  TempdeckCommand,
  encodeCommand,
  formatTemperature,
  setTargetCommand,
} from "../../src/protocol/commands";

describe("Tempdeck commands", () => {
  describe("setTargetCommand", () => {
    it("formats whole degrees with 3 decimals", () => {
      assert.strictEqual(setTargetCommand(35), "M104 S35.000");
    });

    it("rounds extra precision to 3 decimals", () => {
      assert.strictEqual(setTargetCommand(4.12345), "M104 S4.123");
      assert.strictEqual(setTargetCommand(37.5), "M104 S37.500");
    });

    it("passes negative and out-of-range values through unchanged", () => {
      assert.strictEqual(setTargetCommand(-20), "M104 S-20.000");
      assert.strictEqual(setTargetCommand(1000), "M104 S1000.000");
    });

    it("rounds exact ties to even", () => {
      assert.strictEqual(setTargetCommand(35.0625), "M104 S35.062");
      assert.strictEqual(setTargetCommand(35.1875), "M104 S35.188");
    });

    it("rounds from the exact binary value", () => {
      // 1.0005 is stored as 1.000499999999999989...
      assert.strictEqual(setTargetCommand(1.0005), "M104 S1.000");
    });

    it("never switches to exponent notation", () => {
      assert.strictEqual(setTargetCommand(1e21), "M104 S1000000000000000000000.000");
      assert.strictEqual(setTargetCommand(1e-7), "M104 S0.000");
    });
  });

  describe("formatTemperature", () => {
    it("writes non-finite values as the firmware's float words", () => {
      assert.strictEqual(formatTemperature(NaN), "nan");
      assert.strictEqual(formatTemperature(Infinity), "inf");
      assert.strictEqual(formatTemperature(-Infinity), "-inf");
    });
  });

  describe("encodeCommand", () => {
    it("appends CRLF and encodes as ASCII", () => {
      assert.deepStrictEqual(
        encodeCommand(TempdeckCommand.DEACTIVATE),
        new Uint8Array([0x4d, 0x31, 0x38, 0x0d, 0x0a])
      );
    });
  });
});
