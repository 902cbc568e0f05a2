/**
 * Line Protocol Tests
 * Framing, line reads and the double acknowledgment
 */

import { describe, it } from "node:test";
import assert from "node:assert";
import { LineProtocol } from "../../src/protocol/engine";
import { parseFloatOrNone, parseFloatStrict } from "../../src/protocol/fields";
import { silentLogger } from "../../src/logger";
import { ScriptedTransport, lines, reply } from "../helpers/scripted-transport";

function setup(chunks: string[] = []) {
  const transport = new ScriptedTransport(chunks);
  const protocol = new LineProtocol(transport, silentLogger);
  return { transport, protocol };
}

describe("LineProtocol", () => {
  describe("sendCommand()", () => {
    it("writes the command followed by CRLF", async () => {
      const { transport, protocol } = setup();
      await protocol.sendCommand("M105");
      assert.deepStrictEqual(transport.written, ["M105\r\n"]);
    });
  });

  describe("readLine()", () => {
    it("strips the line ending and trailing whitespace", async () => {
      const { protocol } = setup(["C:25.0 T:none  \r\n"]);
      assert.strictEqual(await protocol.readLine(), "C:25.0 T:none");
    });

    it("returns an empty string for a blank line", async () => {
      const { protocol } = setup(["\r\n"]);
      assert.strictEqual(await protocol.readLine(), "");
    });

    it("times out when nothing arrives", async () => {
      const { protocol } = setup();
      await assert.rejects(protocol.readLine(), {
        name: "TempdeckError",
        kind: "response_timeout",
      });
    });

    it("times out on a partial line without LF", async () => {
      const { protocol } = setup(["C:25.0 T:"]);
      await assert.rejects(protocol.readLine(), { kind: "response_timeout" });
    });

    it("rejects bytes outside ASCII", async () => {
      const { protocol } = setup(["model:Té1\n"]);
      await assert.rejects(protocol.readLine(), { kind: "invalid_response" });
    });
  });

  describe("waitForAck()", () => {
    it("consumes exactly two ok lines", async () => {
      const { transport, protocol } = setup(lines("ok", "ok", "next"));
      await protocol.waitForAck();
      assert.strictEqual(transport.remaining, 1);
    });

    it("accepts ok followed by CRLF", async () => {
      const { protocol } = setup(["ok\r\n", "ok\r\n"]);
      await protocol.waitForAck();
    });

    it("fails on the first unexpected line and reads no further", async () => {
      const { transport, protocol } = setup(lines("error", "ok"));
      await assert.rejects(protocol.waitForAck(), {
        kind: "invalid_response",
        message: "Unexpected response when we expected 'ok' (ack line 1 of 2): 'error'",
        response: "error",
      });
      assert.strictEqual(transport.remaining, 1);
    });

    it("names the second line when that one is wrong", async () => {
      const { protocol } = setup(lines("ok", "busy"));
      await assert.rejects(protocol.waitForAck(), {
        kind: "invalid_response",
        message: "Unexpected response when we expected 'ok' (ack line 2 of 2): 'busy'",
      });
    });

    it("times out if the acknowledgment never comes", async () => {
      const { protocol } = setup(lines("ok"));
      await assert.rejects(protocol.waitForAck(), { kind: "response_timeout" });
    });
  });

  describe("ask()", () => {
    it("sends, reads the data line, consumes the ack and parses", async () => {
      const { transport, protocol } = setup(reply("  C:25.9 T:none"));

      const result = await protocol.ask("M105", { C: parseFloatStrict, T: parseFloatOrNone });

      assert.deepStrictEqual(transport.written, ["M105\r\n"]);
      assert.deepStrictEqual(result.fields, { C: 25.9, T: null });
      assert.strictEqual(result.raw, "C:25.9 T:none");
      assert.strictEqual(transport.remaining, 0);
    });

    it("keeps every value as text without parsers", async () => {
      const { protocol } = setup(reply("model:TD1 serial:ABC123"));

      const result = await protocol.ask("M115");

      assert.deepStrictEqual(result.fields, {});
      assert.deepStrictEqual(Object.fromEntries(result.text), { model: "TD1", serial: "ABC123" });
    });

    it("validates the ack before parsing the data line", async () => {
      const { protocol } = setup(lines("C:abc", "error"));
      await assert.rejects(protocol.ask("M105", { C: parseFloatStrict }), {
        kind: "invalid_response",
        response: "error",
      });
    });

    it("reports an unparsable data line once the ack is in", async () => {
      const { transport, protocol } = setup(reply("C:abc T:none"));
      await assert.rejects(protocol.ask("M105", { C: parseFloatStrict, T: parseFloatOrNone }), {
        kind: "invalid_response",
        response: "C:abc T:none",
      });
      assert.strictEqual(transport.remaining, 0);
    });

    it("times out when the device stays silent", async () => {
      const { protocol } = setup();
      await assert.rejects(protocol.ask("M105"), { kind: "response_timeout" });
    });
  });

  describe("close()", () => {
    it("closes the transport", async () => {
      const { transport, protocol } = setup();
      await protocol.close();
      assert.strictEqual(transport.closed, true);
    });
  });
});
