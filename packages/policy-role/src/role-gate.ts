import {
  authFailure,
  err,
  ok,
  type AuthContext,
  type AuthFailure,
  type AuthorizationGatePort,
  type Result,
  type Role,
} from "@credential-core/contracts";
import { createSilentLogger, type CoreLogger } from "@credential-core/telemetry";

import type { RoleGateOptions, RoleRule } from "./types.js";

const escapeForRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

interface ActionMatcher {
  readonly pattern: string;
  readonly role: Role;
  readonly test: (candidate: string) => boolean;
}

const createMatcher = (rule: RoleRule): ActionMatcher => {
  const pattern = rule.action.trim();
  if (pattern === "*") {
    return { pattern, role: rule.role, test: () => true };
  }
  if (!pattern) {
    return { pattern, role: rule.role, test: () => false };
  }
  const expression = new RegExp(`^${escapeForRegExp(pattern).replace(/\\\*/g, ".*")}$`);
  return { pattern, role: rule.role, test: (candidate) => expression.test(candidate) };
};

export class RoleGate implements AuthorizationGatePort {
  private readonly matchers: ReadonlyArray<ActionMatcher>;
  private readonly logger: CoreLogger;

  constructor(options: RoleGateOptions = {}) {
    this.matchers = (options.rules ?? []).map(createMatcher);
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "role_gate" });
  }

  authorize(context: AuthContext, requiredRole?: Role): Result<AuthContext, AuthFailure> {
    if (!requiredRole) {
      return ok(context);
    }
    if (context.role === requiredRole) {
      return ok(context);
    }
    this.logger.warn("authorization.forbidden", {
      username: context.username,
      requiredRole,
      ...(context.role ? { role: context.role } : {}),
    });
    return err(authFailure("auth.forbidden", { requiredRole }));
  }

  /** First matching rule wins; an action no rule mentions only needs an authenticated caller. */
  authorizeAction(context: AuthContext, action: string): Result<AuthContext, AuthFailure> {
    const candidate = action.trim();
    const matcher = this.matchers.find((entry) => entry.test(candidate));
    return this.authorize(context, matcher?.role);
  }

  requiredRoleFor(action: string): Role | undefined {
    const candidate = action.trim();
    return this.matchers.find((entry) => entry.test(candidate))?.role;
  }
}

export const createRoleGate = (options: RoleGateOptions = {}): RoleGate => new RoleGate(options);
