import type { AuthContext } from "@credential-core/contracts";

import type { AccessRequirement, AuthCore } from "./auth-core.js";
import { describeFailure } from "./failure-response.js";

export interface ExpressRequestLike {
  method?: string;
  headers: Record<string, string | readonly string[] | undefined>;
  [key: string]: unknown;
}

export interface ExpressResponseLike {
  statusCode: number;
  setHeader(name: string, value: string): void;
  end(body?: unknown): void;
  locals?: Record<string, unknown>;
}

export type ExpressNextFunction = (error?: unknown) => void;

export type AuthCoreLike = Pick<AuthCore, "authenticate" | "authorize" | "scheme">;

/**
 * Authenticates with the core's scheme and applies the gate. On success the context is exposed as
 * `req.auth` and `res.locals.auth`; on failure the mapped status, challenge and body end the response.
 */
export const createExpressAuthMiddleware = (core: AuthCoreLike, requirement: AccessRequirement = {}) =>
  (req: ExpressRequestLike, res: ExpressResponseLike, next: ExpressNextFunction): void => {
    void (async () => {
      const authenticated = await core.authenticate(readAuthorization(req.headers));
      const decision = authenticated.ok ? core.authorize(authenticated.value, requirement) : authenticated;
      if (decision.ok) {
        attachContext(req, res, decision.value);
        next();
        return;
      }

      const described = describeFailure(decision.error, core.scheme);
      res.statusCode = described.status;
      res.setHeader("content-type", "application/json");
      for (const [name, value] of Object.entries(described.headers)) {
        res.setHeader(name, value);
      }
      res.end(JSON.stringify(described.body));
    })().catch(next);
  };

const readAuthorization = (headers: ExpressRequestLike["headers"]): string | undefined => {
  const value = headers.authorization ?? headers.Authorization;
  if (typeof value === "string") {
    return value;
  }
  return value?.[0];
};

const attachContext = (req: ExpressRequestLike, res: ExpressResponseLike, context: AuthContext): void => {
  req.auth = context;
  res.locals = res.locals ?? {};
  res.locals.auth = context;
};
