/**
 * Tempdeck Serial Transport
 * Line-framed duplex channel over a serial port with a bounded read
 */

import { SerialPort } from "serialport";
import { LF, LineDecoder } from "./lines";
import { createLogger, type Logger } from "../logger";
import { config } from "../config";

/**
 * Bound on every line read; fixed by the device firmware
 */
export const READ_TIMEOUT_MS = 500;

/**
 * What the protocol engine needs from a transport
 */
export interface LineTransport {
  write(data: Uint8Array): Promise<void>;

  /**
   * Resolve with the next line including its trailing LF. If the read
   * times out, resolve with whatever arrived instead (possibly nothing), so
   * a missing trailing LF means "timed out".
   */
  readLine(): Promise<Uint8Array>;

  close(): Promise<void>;
}

/**
 * The subset of a serialport stream this transport drives
 */
export interface SerialPortLike {
  readonly isOpen: boolean;
  on(event: "data", listener: (data: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  write(data: Buffer, callback: (err: Error | null | undefined) => void): boolean;
  drain(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
}

export interface SerialTransportOptions {
  readTimeout?: number;
  logger?: Logger;
}

export interface OpenSerialOptions extends SerialTransportOptions {
  baudRate?: number;
}

type LineWaiter = (line: Uint8Array) => void;

export class SerialTransport implements LineTransport {
  private decoder: LineDecoder;
  private lines: Uint8Array[] = [];
  private waiter: LineWaiter | null = null;
  private readTimeout: number;
  private log: Logger;

  constructor(private serial: SerialPortLike, options: SerialTransportOptions = {}) {
    this.readTimeout = options.readTimeout ?? READ_TIMEOUT_MS;
    this.log = options.logger ?? createLogger("serial", config.LOG_LEVEL);
    this.decoder = new LineDecoder((line) => this.handleLine(line));
    this.setupListeners();
  }

  /**
   * Open a serial port with software flow control
   * Errors from the serial library are passed through as-is
   */
  static open(path: string, options: OpenSerialOptions = {}): Promise<SerialTransport> {
    return new Promise((resolve, reject) => {
      const serial: SerialPort = new SerialPort(
        {
          path,
          baudRate: options.baudRate ?? 115200,
          dataBits: 8,
          parity: "none",
          stopBits: 1,
          rtscts: false,
          xon: true,   // XON/XOFF flow control
          xoff: true,
          xany: false,
        },
        (err) => {
          if (err) {
            reject(err);
            return;
          }
          resolve(new SerialTransport(serial, options));
        }
      );
    });
  }

  private setupListeners(): void {
    this.serial.on("data", (data: Buffer) => {
      this.decoder.feed(new Uint8Array(data));
    });

    this.serial.on("error", (err: Error) => {
      this.log.error("Serial error:", err.message);
    });

    this.serial.on("close", () => {
      this.log.debug("Serial port closed");
    });
  }

  private handleLine(line: Uint8Array): void {
    if (this.waiter) {
      this.waiter(line);
    } else {
      this.lines.push(line);
    }
  }

  async write(data: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.serial.write(Buffer.from(data), (err) => {
        if (err) {
          reject(err);
          return;
        }
        // Drain to ensure data is sent
        this.serial.drain((drainErr) => {
          if (drainErr) {
            reject(drainErr);
          } else {
            resolve();
          }
        });
      });
    });
  }

  async readLine(): Promise<Uint8Array> {
    const queued = this.lines.shift();
    if (queued) return queued;

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        const partial = this.decoder.flush();
        this.log.debug(`Read timed out after ${this.readTimeout}ms (${partial.length} bytes pending)`);
        resolve(partial);
      }, this.readTimeout);

      this.waiter = (line) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(line);
      };
    });
  }

  /**
   * Close the port; buffered input is discarded
   */
  async close(): Promise<void> {
    this.lines = [];
    this.decoder.reset();
    if (!this.serial.isOpen) return;

    return new Promise((resolve, reject) => {
      this.serial.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Lines received but not yet read (for debugging)
   */
  get pendingLines(): number {
    return this.lines.length;
  }
}

/**
 * True if a line read from a transport is complete
 */
export function endsWithLineFeed(line: Uint8Array): boolean {
  return line.length > 0 && line[line.length - 1] === LF;
}
