import { Incident } from "incident";
import type { Uint8, UintSize } from "semantic-types";

export type Name = "ResponseHeader";
export const name: Name = "ResponseHeader";

export interface Data {
  pos: UintSize;
  byte: Uint8;
}

export type Cause = undefined;
export type ResponseHeaderError = Incident<Data, Name, Cause>;

export function format({pos, byte}: Data): string {
  return `Expected SP after the status code at offset ${pos}, found 0x${byte.toString(16).padStart(2, "0")}`;
}

export function createResponseHeaderError(pos: UintSize, byte: Uint8): ResponseHeaderError {
  return new Incident(name, {pos, byte}, format);
}
