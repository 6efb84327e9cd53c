import type { CoreError } from "@credential-core/contracts";
import type { AuthScheme } from "@credential-core/config";

export interface FailureDescription {
  readonly status: number;
  readonly body: { readonly detail: string };
  readonly headers: Readonly<Record<string, string>>;
}

const CHALLENGES: Record<AuthScheme, string> = {
  basic: "Basic",
  bearer: "Bearer",
};

const unauthorized = (detail: string, scheme: AuthScheme): FailureDescription => ({
  status: 401,
  body: { detail },
  headers: { "www-authenticate": CHALLENGES[scheme] },
});

const plain = (status: number, detail: string): FailureDescription => ({
  status,
  body: { detail },
  headers: {},
});

/**
 * The one place an error code becomes an HTTP status. `auth.unknown_user` and `auth.bad_secret`
 * share a response that never reveals which usernames exist.
 */
export const describeFailure = (error: CoreError, scheme: AuthScheme): FailureDescription => {
  switch (error.code) {
    case "auth.unknown_user":
    case "auth.bad_secret":
      return unauthorized("Invalid credentials", scheme);
    case "auth.expired":
    case "auth.malformed_or_unsigned":
    case "request.missing_credentials":
      return unauthorized("Could not validate credentials", scheme);
    case "auth.forbidden":
      return plain(403, "Insufficient permissions");
    case "registration.duplicate_username":
    case "registration.username_too_short":
    case "registration.password_too_short":
      return plain(400, error.message);
    case "request.invalid_body":
      return plain(400, "Invalid request body");
    case "persistence.write_failed":
      return plain(500, "Failed to save user data");
    case "persistence.read_failed":
      return plain(500, "Failed to load user data");
    default:
      return plain(500, "Internal server error");
  }
};
