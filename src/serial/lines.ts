/**
 * Line Decoder
 * Splits the serial byte stream into LF-terminated lines
 *
 * Protocol:
 * - 0x0A (LF) ends a line; the emitted line keeps it
 * - CR is ordinary data here, stripping happens in the protocol layer
 */

export const LF = 0x0a;

export type LineCallback = (line: Uint8Array) => void;

export class LineDecoder {
  private buffer: number[] = [];
  private onLine: LineCallback;

  constructor(onLine: LineCallback) {
    this.onLine = onLine;
  }

  /**
   * Feed raw bytes from serial port
   */
  feed(data: Uint8Array): void {
    for (const byte of data) {
      this.buffer.push(byte);
      if (byte === LF) {
        this.onLine(new Uint8Array(this.buffer));
        this.buffer = [];
      }
    }
  }

  /**
   * Take whatever partial line is buffered (empty if none)
   */
  flush(): Uint8Array {
    const partial = new Uint8Array(this.buffer);
    this.buffer = [];
    return partial;
  }

  /**
   * Drop any partial line
   */
  reset(): void {
    this.buffer = [];
  }
}
