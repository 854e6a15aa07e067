import type { UintSize } from "semantic-types";
import { ByteCursor } from "./byte-cursor.js";
import { createInvalidUrlError } from "./errors/invalid-url.js";
import { DEFAULT_PARSE_CONTEXT, type ParseContext } from "./parse-context.js";
import { complete, failure, type ParseResult, ResultType } from "./parse-result.js";
import { scanLine, skipBlankLines } from "./parsers/line.js";
import { parseUtf8 } from "./parsers/text.js";

export interface RequestFrame {
  url: URL;

  /**
   * Number of bytes taken by the frame, including leading blank lines and the terminator.
   */
  byteLength: UintSize;
}

/**
 * Parses a request line (`<absolute-url><CRLF>`) at the start of `bytes`.
 *
 * Blank lines before the request line are skipped. The request line has no length ceiling:
 * bound the buffer before calling this function.
 *
 * @param bytes Bytes received so far, starting at the beginning of the frame.
 * @param context Parse configuration, provides the URL parser.
 */
export function parseRequest(
  bytes: Uint8Array,
  context: ParseContext = DEFAULT_PARSE_CONTEXT,
): ParseResult<RequestFrame> {
  const cursor: ByteCursor = new ByteCursor(bytes);
  const skipped: ParseResult<void> = skipBlankLines(cursor);
  if (skipped.type !== ResultType.Complete) {
    return skipped;
  }

  const start: UintSize = cursor.pos;
  const end: ParseResult<UintSize> = scanLine(cursor);
  if (end.type !== ResultType.Complete) {
    return end;
  }

  const text: ParseResult<string> = parseUtf8(cursor, start, end.value);
  if (text.type !== ResultType.Complete) {
    return text;
  }

  let url: URL;
  try {
    url = context.parseUrl(text.value);
  } catch (err) {
    const cause: Error = err instanceof Error ? err : new Error(String(err));
    return failure(createInvalidUrlError(cause, text.value));
  }
  return complete({url, byteLength: cursor.pos});
}

/**
 * Client request frame.
 */
export class Request {
  url: URL | undefined;

  constructor() {
    this.url = undefined;
  }

  /**
   * Parses the request line from the start of `bytes`.
   *
   * `url` is only written once the whole frame is valid, so the request can be parsed again
   * with a longer buffer after a `Partial` result.
   *
   * @returns The number of bytes consumed by the frame.
   */
  parse(bytes: Uint8Array, context?: ParseContext): ParseResult<UintSize> {
    const result: ParseResult<RequestFrame> = parseRequest(bytes, context);
    if (result.type !== ResultType.Complete) {
      return result;
    }
    this.url = result.value.url;
    return complete(result.value.byteLength);
  }
}
