import type { AuthContext } from "../../types/credential.js";
import type { CoreError } from "../../types/domain-error.js";
import type { AuthFailure, PersistenceError } from "../../types/errors.js";
import type { Result } from "../../types/result.js";
import type { IssuedSession } from "../../types/token.js";

export interface SessionTokenPort {
  issue(username: string): Promise<Result<IssuedSession, CoreError>>;
  validate(token: string): Promise<Result<AuthContext, AuthFailure | PersistenceError>>;
}
