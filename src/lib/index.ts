export { ByteCursor } from "./byte-cursor.js";
export { createCursorOverrunError, type CursorOverrunError } from "./errors/cursor-overrun.js";
export {
  createInvalidParseOptionsError,
  type InvalidParseOptionsError,
} from "./errors/invalid-parse-options.js";
export { createInvalidStatusError, type InvalidStatusError } from "./errors/invalid-status.js";
export { createInvalidUrlError, type InvalidUrlError } from "./errors/invalid-url.js";
export { createInvalidUtf8Error, type InvalidUtf8Error } from "./errors/invalid-utf8.js";
export { createLineTerminatorError, type LineTerminatorError } from "./errors/line-terminator.js";
export type { ParseError, ParseErrorName } from "./errors/parse-error.js";
export { createResponseHeaderError, type ResponseHeaderError } from "./errors/response-header.js";
export * from "./parse-context.js";
export * from "./parse-result.js";
export { CR, LF, scanLine, scanLineLimit, skipBlankLines } from "./parsers/line.js";
export { parseStatusCode } from "./parsers/status-code.js";
export { parseUtf8 } from "./parsers/text.js";
export * from "./request.js";
export * from "./response.js";
export * from "./status-category.js";
