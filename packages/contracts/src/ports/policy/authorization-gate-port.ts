import type { AuthContext, Role } from "../../types/credential.js";
import type { AuthFailure } from "../../types/errors.js";
import type { Result } from "../../types/result.js";

export interface AuthorizationGatePort {
  authorize(context: AuthContext, requiredRole?: Role): Result<AuthContext, AuthFailure>;
  authorizeAction(context: AuthContext, action: string): Result<AuthContext, AuthFailure>;
}
