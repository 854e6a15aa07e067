import type { Uint8, UintSize } from "semantic-types";
import type { ByteCursor } from "../byte-cursor.js";
import { createLineTerminatorError } from "../errors/line-terminator.js";
import { complete, failure, type ParseResult, PARTIAL } from "../parse-result.js";

export const CR: Uint8 = 0x0d;
export const LF: Uint8 = 0x0a;

/**
 * Skips the blank lines (`CRLF` or `LF`) at the cursor.
 *
 * Completes once the cursor is on the first byte of a content line.
 * A `CR` followed by anything but `LF` is an error; a trailing `CR` is `Partial`.
 */
export function skipBlankLines(cursor: ByteCursor): ParseResult<void> {
  for (;;) {
    const byte: Uint8 | undefined = cursor.peek();
    if (byte === undefined) {
      return PARTIAL;
    }
    if (byte === CR) {
      cursor.bump();
      const pos: UintSize = cursor.pos;
      const next: Uint8 | undefined = cursor.next();
      if (next === undefined) {
        return PARTIAL;
      } else if (next !== LF) {
        return failure(createLineTerminatorError(pos));
      }
    } else if (byte === LF) {
      cursor.bump();
    } else {
      return complete(undefined);
    }
  }
}

/**
 * Finds the end of the line starting at the cursor.
 *
 * @returns The offset where the line content ends, the cursor is left after the terminator.
 */
export function scanLine(cursor: ByteCursor): ParseResult<UintSize> {
  return scanLineInner(cursor, undefined);
}

/**
 * Same as `scanLine`, but fails once the content exceeds `limit` bytes.
 */
export function scanLineLimit(cursor: ByteCursor, limit: UintSize): ParseResult<UintSize> {
  return scanLineInner(cursor, limit);
}

function scanLineInner(cursor: ByteCursor, limit: UintSize | undefined): ParseResult<UintSize> {
  const start: UintSize = cursor.pos;
  for (;;) {
    const byte: Uint8 | undefined = cursor.peek();
    if (byte === undefined) {
      return PARTIAL;
    }
    if (byte === CR) {
      cursor.bump();
      const pos: UintSize = cursor.pos;
      const next: Uint8 | undefined = cursor.next();
      if (next === undefined) {
        return PARTIAL;
      }
      return next === LF ? complete(cursor.pos - 2) : failure(createLineTerminatorError(pos));
    } else if (byte === LF) {
      cursor.bump();
      return complete(cursor.pos - 1);
    }
    if (limit !== undefined && cursor.pos - start + 1 > limit) {
      return failure(createLineTerminatorError(cursor.pos, limit));
    }
    cursor.bump();
  }
}
