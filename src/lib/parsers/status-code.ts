import type { Uint8, UintSize } from "semantic-types";
import type { ByteCursor } from "../byte-cursor.js";
import { createInvalidStatusError } from "../errors/invalid-status.js";
import { complete, failure, type ParseResult, PARTIAL } from "../parse-result.js";

const DIGIT_0: Uint8 = 0x30;
const DIGIT_9: Uint8 = 0x39;

/**
 * Parses a two-digit status code, `00` to `99`.
 */
export function parseStatusCode(cursor: ByteCursor): ParseResult<Uint8> {
  let code: Uint8 = 0;
  for (let i: number = 0; i < 2; i++) {
    const pos: UintSize = cursor.pos;
    const byte: Uint8 | undefined = cursor.next();
    if (byte === undefined) {
      return PARTIAL;
    }
    if (byte < DIGIT_0 || byte > DIGIT_9) {
      return failure(createInvalidStatusError(pos, byte));
    }
    code = code * 10 + (byte - DIGIT_0);
  }
  return complete(code);
}
