import type { Uint8, UintSize } from "semantic-types";
import { ByteCursor } from "./byte-cursor.js";
import { createResponseHeaderError } from "./errors/response-header.js";
import { DEFAULT_PARSE_CONTEXT, type ParseContext } from "./parse-context.js";
import { complete, failure, type ParseResult, PARTIAL, ResultType } from "./parse-result.js";
import { scanLineLimit } from "./parsers/line.js";
import { parseStatusCode } from "./parsers/status-code.js";
import { parseUtf8 } from "./parsers/text.js";
import { getStatusCategory, type StatusCategory } from "./status-category.js";

const SP: Uint8 = 0x20;

export interface ResponseFrame {
  status: Uint8;
  meta: string;
  byteLength: UintSize;
}

/**
 * Parses a response header (`<2 digits><SP><meta><CRLF>`) at the start of `bytes`.
 *
 * @param bytes Bytes received so far, starting at the beginning of the frame.
 * @param context Parse configuration, provides the metadata ceiling.
 */
export function parseResponse(
  bytes: Uint8Array,
  context: ParseContext = DEFAULT_PARSE_CONTEXT,
): ParseResult<ResponseFrame> {
  const cursor: ByteCursor = new ByteCursor(bytes);
  const status: ParseResult<Uint8> = parseStatusCode(cursor);
  if (status.type !== ResultType.Complete) {
    return status;
  }

  const sepPos: UintSize = cursor.pos;
  const sep: Uint8 | undefined = cursor.next();
  if (sep === undefined) {
    return PARTIAL;
  } else if (sep !== SP) {
    return failure(createResponseHeaderError(sepPos, sep));
  }

  const start: UintSize = cursor.pos;
  const end: ParseResult<UintSize> = scanLineLimit(cursor, context.getMetaMaxLength());
  if (end.type !== ResultType.Complete) {
    return end;
  }

  const meta: ParseResult<string> = parseUtf8(cursor, start, end.value);
  if (meta.type !== ResultType.Complete) {
    return meta;
  }
  return complete({status: status.value, meta: meta.value, byteLength: cursor.pos});
}

/**
 * Server response header frame.
 */
export class Response {
  status: Uint8 | undefined;
  meta: string | undefined;

  constructor() {
    this.status = undefined;
    this.meta = undefined;
  }

  get category(): StatusCategory | undefined {
    return this.status === undefined ? undefined : getStatusCategory(this.status);
  }

  /**
   * Parses the response header from the start of `bytes`.
   *
   * `status` and `meta` are written together, only once the whole header is valid.
   */
  parse(bytes: Uint8Array, context?: ParseContext): ParseResult<void> {
    const result: ParseResult<ResponseFrame> = parseResponse(bytes, context);
    if (result.type !== ResultType.Complete) {
      return result;
    }
    this.status = result.value.status;
    this.meta = result.value.meta;
    return complete(undefined);
  }
}
