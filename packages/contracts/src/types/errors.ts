import type { DomainError, InfraError } from "./domain-error.js";

export type AuthFailureCode =
  | "auth.unknown_user"
  | "auth.bad_secret"
  | "auth.expired"
  | "auth.malformed_or_unsigned"
  | "auth.forbidden";

export interface AuthFailure extends DomainError {
  readonly code: AuthFailureCode;
}

export type RegistrationErrorCode =
  | "registration.duplicate_username"
  | "registration.username_too_short"
  | "registration.password_too_short";

export interface RegistrationError extends DomainError {
  readonly code: RegistrationErrorCode;
}

export type PersistenceErrorCode = "persistence.read_failed" | "persistence.write_failed";

export interface PersistenceError extends InfraError {
  readonly code: PersistenceErrorCode;
}

const AUTH_FAILURE_MESSAGES: Record<AuthFailureCode, string> = {
  "auth.unknown_user": "No credential is registered for this username",
  "auth.bad_secret": "Presented secret does not match the stored digest",
  "auth.expired": "Session token has expired",
  "auth.malformed_or_unsigned": "Session token is malformed or its signature does not verify",
  "auth.forbidden": "Identity lacks the role required for this action",
};

export const authFailure = (code: AuthFailureCode, details?: Record<string, unknown>): AuthFailure => ({
  code,
  message: AUTH_FAILURE_MESSAGES[code],
  ...(details ? { details } : {}),
});

export const registrationError = (
  code: RegistrationErrorCode,
  message: string,
  details?: Record<string, unknown>,
): RegistrationError => ({
  code,
  message,
  ...(details ? { details } : {}),
});

export const persistenceError = (
  code: PersistenceErrorCode,
  message: string,
  cause: unknown,
  details?: Record<string, unknown>,
): PersistenceError => ({
  code,
  message,
  details: { ...(details ?? {}), cause: normalizeCause(cause) },
  retryable: false,
});

const normalizeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
};

export const isAuthFailure = (error: DomainError): error is AuthFailure => error.code.startsWith("auth.");

export const isPersistenceError = (error: DomainError): error is PersistenceError =>
  error.code.startsWith("persistence.");
