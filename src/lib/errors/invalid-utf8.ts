import { Incident } from "incident";
import type { UintSize } from "semantic-types";

export type Name = "InvalidUtf8";
export const name: Name = "InvalidUtf8";

export interface Data {
  start: UintSize;
  end: UintSize;
}

export type Cause = Error;
export type InvalidUtf8Error = Incident<Data, Name, Cause>;

export function format({start, end}: Data): string {
  return `Bytes ${start}..${end} are not valid UTF-8`;
}

export function createInvalidUtf8Error(cause: Error, start: UintSize, end: UintSize): InvalidUtf8Error {
  return new Incident(cause, name, {start, end}, format);
}
