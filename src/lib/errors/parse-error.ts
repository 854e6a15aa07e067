import type { InvalidStatusError } from "./invalid-status.js";
import type { InvalidUrlError } from "./invalid-url.js";
import type { InvalidUtf8Error } from "./invalid-utf8.js";
import type { LineTerminatorError } from "./line-terminator.js";
import type { ResponseHeaderError } from "./response-header.js";

/**
 * Any protocol error a frame parser can report.
 *
 * Every kind is terminal for the frame: the connection carrying it is malformed.
 */
export type ParseError =
  | LineTerminatorError
  | InvalidUtf8Error
  | InvalidUrlError
  | ResponseHeaderError
  | InvalidStatusError;

export type ParseErrorName = ParseError["name"];
