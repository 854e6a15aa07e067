import { Incident } from "incident";
import type { UintSize } from "semantic-types";

export type Name = "CursorOverrun";
export const name: Name = "CursorOverrun";

export interface Data {
  pos: UintSize;
}

export type Cause = undefined;
export type CursorOverrunError = Incident<Data, Name, Cause>;

export function format({pos}: Data): string {
  return `Cannot advance past the end of the buffer (offset ${pos})`;
}

export function createCursorOverrunError(pos: UintSize): CursorOverrunError {
  return new Incident(name, {pos}, format);
}
