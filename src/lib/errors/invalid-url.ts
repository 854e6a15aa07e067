import { Incident } from "incident";

export type Name = "InvalidUrl";
export const name: Name = "InvalidUrl";

export interface Data {
  input: string;
}

export type Cause = Error;
export type InvalidUrlError = Incident<Data, Name, Cause>;

export function format({input}: Data): string {
  return `Failed to parse request URL: ${JSON.stringify(input)}`;
}

export function createInvalidUrlError(cause: Error, input: string): InvalidUrlError {
  return new Incident(cause, name, {input}, format);
}
