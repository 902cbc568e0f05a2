/**
 * Tempdeck Line Protocol
 * Command framing, response reading and the double "ok" acknowledgment
 *
 * Strictly request/response: one command in flight per transport. Callers
 * sharing a connection must serialize their calls.
 */

import type { LineTransport } from "../serial/transport";
import { endsWithLineFeed } from "../serial/transport";
import { ACK, ACK_LINES, encodeCommand } from "./commands";
import { parseResponse, type FieldParsers, type ParsedResponse } from "./fields";
import { invalidResponse, responseTimeout } from "../errors";
import type { Logger } from "../logger";

function isAscii(bytes: Uint8Array): boolean {
  return bytes.every((b) => b < 0x80);
}

export class LineProtocol {
  constructor(
    private transport: LineTransport,
    private log: Logger
  ) {}

  /**
   * Write one command line (CRLF appended)
   */
  async sendCommand(cmd: string): Promise<void> {
    this.log.debug(`-> ${cmd}`);
    await this.transport.write(encodeCommand(cmd));
  }

  /**
   * Read one LF-terminated line, trailing whitespace stripped
   * @throws TempdeckError (response_timeout) if no complete line arrived
   */
  async readLine(): Promise<string> {
    const bytes = await this.transport.readLine();
    if (!endsWithLineFeed(bytes)) {
      throw responseTimeout();
    }

    const text = Buffer.from(bytes).toString("latin1");
    if (!isAscii(bytes)) {
      throw invalidResponse(`Response is not ASCII text: ${JSON.stringify(text)}`, text);
    }

    const line = text.trimEnd();
    this.log.debug(`<- ${line}`);
    return line;
  }

  /**
   * Consume the two "ok" lines that follow every command
   * Stops at the first unexpected line
   */
  async waitForAck(): Promise<void> {
    for (let i = 1; i <= ACK_LINES; i++) {
      const line = await this.readLine();
      if (line !== ACK) {
        throw invalidResponse(
          `Unexpected response when we expected '${ACK}' (ack line ${i} of ${ACK_LINES}): '${line}'`,
          line
        );
      }
    }
  }

  /**
   * Send a command that answers with one data line, then the acknowledgment.
   * Without parsers every value comes back as text.
   */
  async ask(cmd: string): Promise<ParsedResponse<Record<string, never>>>;
  async ask<T>(cmd: string, parsers: FieldParsers<T>): Promise<ParsedResponse<T>>;
  async ask<T>(
    cmd: string,
    parsers?: FieldParsers<T>
  ): Promise<ParsedResponse<T> | ParsedResponse<Record<string, never>>> {
    await this.sendCommand(cmd);
    const response = (await this.readLine()).trim();
    await this.waitForAck();
    return parsers ? parseResponse(response, parsers) : parseResponse<Record<string, never>>(response, {});
  }

  close(): Promise<void> {
    return this.transport.close();
  }
}
