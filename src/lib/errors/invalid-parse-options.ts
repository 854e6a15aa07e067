import { Incident } from "incident";

export type Name = "InvalidParseOptions";
export const name: Name = "InvalidParseOptions";

export interface Data {
  metaMaxLength: number;
}

export type Cause = undefined;
export type InvalidParseOptionsError = Incident<Data, Name, Cause>;

export function format({metaMaxLength}: Data): string {
  return `metaMaxLength must be a non-negative safe integer, got ${metaMaxLength}`;
}

export function createInvalidParseOptionsError(metaMaxLength: number): InvalidParseOptionsError {
  return new Incident(name, {metaMaxLength}, format);
}
