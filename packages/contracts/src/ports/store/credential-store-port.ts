import type { CoreError } from "../../types/domain-error.js";
import type { CredentialSnapshot } from "../../types/credential.js";
import type { PersistenceError } from "../../types/errors.js";
import type { Result } from "../../types/result.js";

export interface CredentialMutation<TValue> {
  readonly next: CredentialSnapshot;
  readonly value: TValue;
}

/**
 * Receives the current document and returns either the replacement document plus a value for the
 * caller, or an error. Nothing is written when the mutator returns an error.
 */
export type CredentialMutator<TValue, TError extends CoreError> = (
  snapshot: CredentialSnapshot,
) => Result<CredentialMutation<TValue>, TError> | Promise<Result<CredentialMutation<TValue>, TError>>;

export interface CredentialStorePort {
  open(): Promise<void>;
  close(): Promise<void>;
  load(): Promise<Result<CredentialSnapshot, PersistenceError>>;
  save(snapshot: CredentialSnapshot): Promise<Result<void, PersistenceError>>;
  /**
   * Read-modify-write under the store's single writer lock. Every mutating operation goes through here.
   */
  update<TValue, TError extends CoreError>(
    mutator: CredentialMutator<TValue, TError>,
  ): Promise<Result<TValue, TError | PersistenceError>>;
}
