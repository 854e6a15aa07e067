import { Incident } from "incident";
import type { UintSize } from "semantic-types";

export type Name = "LineTerminator";
export const name: Name = "LineTerminator";

export interface Data {
  /**
   * Offset of the offending byte.
   */
  pos: UintSize;

  /**
   * Content length ceiling that was exceeded, if the error comes from the ceiling.
   */
  limit?: UintSize;
}

export type Cause = undefined;
export type LineTerminatorError = Incident<Data, Name, Cause>;

export function format({pos, limit}: Data): string {
  if (limit !== undefined) {
    return `Line content exceeds ${limit} bytes at offset ${pos}`;
  }
  return `Expected LF after CR at offset ${pos}`;
}

export function createLineTerminatorError(pos: UintSize, limit?: UintSize): LineTerminatorError {
  return new Incident(name, limit === undefined ? {pos} : {pos, limit}, format);
}
