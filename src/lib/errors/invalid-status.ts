import { Incident } from "incident";
import type { Uint8, UintSize } from "semantic-types";

export type Name = "InvalidStatus";
export const name: Name = "InvalidStatus";

export interface Data {
  pos: UintSize;
  byte: Uint8;
}

export type Cause = undefined;
export type InvalidStatusError = Incident<Data, Name, Cause>;

export function format({pos, byte}: Data): string {
  return `Expected a status digit at offset ${pos}, found 0x${byte.toString(16).padStart(2, "0")}`;
}

export function createInvalidStatusError(pos: UintSize, byte: Uint8): InvalidStatusError {
  return new Incident(name, {pos, byte}, format);
}
