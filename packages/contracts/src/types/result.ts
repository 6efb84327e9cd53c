import type { CoreError } from "./domain-error.js";

export interface Ok<TValue> {
  readonly ok: true;
  readonly value: TValue;
}

export interface Err<TError> {
  readonly ok: false;
  readonly error: TError;
}

export type Result<TValue, TError extends CoreError = CoreError> = Ok<TValue> | Err<TError>;

export const ok = <TValue>(value: TValue): Ok<TValue> => ({ ok: true as const, value });

export const err = <TError extends CoreError>(error: TError): Err<TError> => ({
  ok: false as const,
  error,
});
