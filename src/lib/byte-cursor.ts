import { ReadableStream } from "@open-flash/stream";
import type { Uint8, UintSize } from "semantic-types";
import { createCursorOverrunError } from "./errors/cursor-overrun.js";

/**
 * Position-tracking view over a borrowed byte buffer.
 *
 * The cursor never copies the buffer: `slice` returns views into the original bytes.
 * Reads at the end of the buffer return `undefined` instead of failing.
 */
export class ByteCursor {
  readonly bytes: Uint8Array;
  private readonly stream: ReadableStream;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.stream = new ReadableStream(bytes);
  }

  get pos(): UintSize {
    return this.stream.bytePos;
  }

  available(): UintSize {
    return this.stream.available();
  }

  peek(): Uint8 | undefined {
    return this.stream.available() > 0 ? this.stream.peekUint8() : undefined;
  }

  /**
   * Advances past a byte previously observed with `peek`.
   *
   * @throws CursorOverrunError At the end of the buffer.
   */
  bump(): void {
    if (this.stream.available() === 0) {
      throw createCursorOverrunError(this.pos);
    }
    this.stream.skip(1);
  }

  next(): Uint8 | undefined {
    return this.stream.available() > 0 ? this.stream.readUint8() : undefined;
  }

  /**
   * Returns the bytes between the offsets `start` (inclusive) and `end` (exclusive).
   */
  slice(start: UintSize, end: UintSize): Uint8Array {
    if (!(0 <= start && start <= end && end <= this.bytes.length)) {
      throw new RangeError(`Invalid range ${start}..${end} for a buffer of ${this.bytes.length} bytes`);
    }
    return this.bytes.subarray(start, end);
  }
}
