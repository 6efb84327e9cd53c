import type { AuthFailure, DomainError, PersistenceError } from "@credential-core/contracts";

export type RequestErrorCode = "request.missing_credentials" | "request.invalid_body";

/** Failures that only exist at the transport boundary. */
export interface RequestError extends DomainError {
  readonly code: RequestErrorCode;
}

export const requestError = (
  code: RequestErrorCode,
  message: string,
  details?: Record<string, unknown>,
): RequestError => ({
  code,
  message,
  ...(details ? { details } : {}),
});

export type AuthenticationError = AuthFailure | PersistenceError | RequestError;
