import type { ParseError } from "./errors/parse-error.js";

export enum ResultType {
  Complete,
  Partial,
  Error,
}

/**
 * Enough bytes were available and the grammar matched.
 */
export interface Complete<T> {
  type: ResultType.Complete;
  value: T;
}

/**
 * Not enough bytes were available yet. This is not an error: retry with a longer buffer.
 */
export interface Partial {
  type: ResultType.Partial;
}

/**
 * The bytes violate the grammar. Terminal for the frame.
 */
export interface Failure<E extends ParseError = ParseError> {
  type: ResultType.Error;
  error: E;
}

export type Status<T> = Complete<T> | Partial;

export type ParseResult<T> = Status<T> | Failure;

export const PARTIAL: Partial = Object.freeze({type: ResultType.Partial});

export function complete<T>(value: T): Complete<T> {
  return {type: ResultType.Complete, value};
}

export function failure<E extends ParseError>(error: E): Failure<E> {
  return {type: ResultType.Error, error};
}
