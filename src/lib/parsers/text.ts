import type { UintSize } from "semantic-types";
import { TextDecoder } from "util";
import type { ByteCursor } from "../byte-cursor.js";
import { createInvalidUtf8Error } from "../errors/invalid-utf8.js";
import { complete, failure, type ParseResult } from "../parse-result.js";

const UTF8_DECODER: TextDecoder = new TextDecoder("utf-8", {fatal: true, ignoreBOM: true});

/**
 * Decodes the bytes between `start` and `end` as strict UTF-8.
 */
export function parseUtf8(cursor: ByteCursor, start: UintSize, end: UintSize): ParseResult<string> {
  const bytes: Uint8Array = cursor.slice(start, end);
  let text: string;
  try {
    text = UTF8_DECODER.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) {
      return failure(createInvalidUtf8Error(err, start, end));
    }
    throw err;
  }
  return complete(text);
}
