import type { UintSize } from "semantic-types";
import { createInvalidParseOptionsError } from "./errors/invalid-parse-options.js";

/**
 * Maximum byte length of the metadata in a response header.
 */
export const META_MAX_LENGTH: UintSize = 1024;

/**
 * Parses the text of a request line into an absolute URL, throwing if it is rejected.
 */
export type UrlParser = (input: string) => URL;

export interface ParseContext {
  getMetaMaxLength(): UintSize;

  parseUrl(input: string): URL;
}

export interface ParseOptions {
  metaMaxLength?: UintSize;
  urlParser?: UrlParser;
}

export function parseWhatwgUrl(input: string): URL {
  return new URL(input);
}

export class DefaultParseContext implements ParseContext {
  private readonly metaMaxLength: UintSize;
  private readonly urlParser: UrlParser;

  constructor(options: ParseOptions = {}) {
    const metaMaxLength: number = options.metaMaxLength ?? META_MAX_LENGTH;
    if (!Number.isSafeInteger(metaMaxLength) || metaMaxLength < 0) {
      throw createInvalidParseOptionsError(metaMaxLength);
    }
    this.metaMaxLength = metaMaxLength;
    this.urlParser = options.urlParser ?? parseWhatwgUrl;
  }

  getMetaMaxLength(): UintSize {
    return this.metaMaxLength;
  }

  parseUrl(input: string): URL {
    return this.urlParser(input);
  }
}

export const DEFAULT_PARSE_CONTEXT: ParseContext = new DefaultParseContext();
