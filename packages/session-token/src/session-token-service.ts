import { createHmac, randomUUID, timingSafeEqual } from "node:crypto";

import {
  authFailure,
  err,
  ok,
  toAuthContext,
  type AuthContext,
  type AuthFailure,
  type CoreError,
  type CredentialStorePort,
  type IssuedSession,
  type PersistenceError,
  type Result,
  type SessionTokenClaims,
  type SessionTokenPort,
} from "@credential-core/contracts";
import { createSilentLogger, type CoreLogger } from "@credential-core/telemetry";

import type { SessionTokenServiceOptions } from "./types.js";

export const DEFAULT_SESSION_TTL_SECONDS = 30 * 60;

const TOKEN_HEADER = { alg: "HS256", typ: "JWT" } as const;

export class SessionTokenService implements SessionTokenPort {
  private readonly store: CredentialStorePort;
  private readonly signingKey: string;
  private readonly issuer: string;
  private readonly ttlSeconds: number;
  private readonly now: () => Date;
  private readonly jtiFactory: () => string;
  private readonly logger: CoreLogger;

  constructor(options: SessionTokenServiceOptions) {
    if (!options.issuer || options.issuer.trim().length === 0) {
      throw new Error("SessionTokenService requires a non-empty issuer");
    }
    if (!options.signingKey) {
      throw new Error("SessionTokenService requires a signing key");
    }

    this.store = options.store;
    this.signingKey = options.signingKey;
    this.issuer = options.issuer;
    this.ttlSeconds = Math.max(1, options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS);
    this.now = options.now ?? (() => new Date());
    this.jtiFactory = options.jtiFactory ?? randomUUID;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "session_token" });
  }

  async issue(username: string): Promise<Result<IssuedSession, CoreError>> {
    // Store keys are exact, so the subject is embedded verbatim; only a blank one is refused.
    const subject = username;
    if (subject.trim().length === 0) {
      return err({ code: "token.invalid_subject", message: "Subject is required" });
    }

    const issuedAt = Math.floor(this.now().getTime() / 1000);
    const expiresAtSeconds = issuedAt + this.ttlSeconds;
    const claims: SessionTokenClaims = {
      iss: this.issuer,
      sub: subject,
      iat: issuedAt,
      exp: expiresAtSeconds,
      jti: this.jtiFactory(),
      token_type: "session",
    };

    try {
      return ok({
        token: this.sign(claims),
        tokenType: "bearer",
        username: subject,
        expiresInSeconds: this.ttlSeconds,
        expiresAt: new Date(expiresAtSeconds * 1000).toISOString(),
      });
    } catch (error) {
      return err({
        code: "token.sign_failed",
        message: "Failed to sign session token",
        details: { cause: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  /**
   * Checks shape, signature and expiry, then resolves the subject against the current store so a
   * token for a removed account stops working straight away.
   */
  async validate(token: string): Promise<Result<AuthContext, AuthFailure | PersistenceError>> {
    const claims = this.verify(token);
    if (!claims) {
      return err(authFailure("auth.malformed_or_unsigned"));
    }

    if (this.now().getTime() >= claims.exp * 1000) {
      this.logger.debug("session.expired", { username: claims.sub, jti: claims.jti });
      return err(authFailure("auth.expired", { expiredAt: new Date(claims.exp * 1000).toISOString() }));
    }

    const loaded = await this.store.load();
    if (!loaded.ok) {
      return loaded;
    }

    const record = loaded.value.get(claims.sub);
    if (!record) {
      this.logger.warn("session.unknown_user", { username: claims.sub, jti: claims.jti });
      return err(authFailure("auth.unknown_user"));
    }

    return ok(toAuthContext(record));
  }

  private sign(claims: SessionTokenClaims): string {
    const signingInput = `${toBase64Url(JSON.stringify(TOKEN_HEADER))}.${toBase64Url(JSON.stringify(claims))}`;
    return `${signingInput}.${this.signature(signingInput)}`;
  }

  private signature(signingInput: string): string {
    return toBase64Url(createHmac("sha256", this.signingKey).update(signingInput).digest());
  }

  private verify(token: string): SessionTokenClaims | undefined {
    const segments = token.split(".");
    if (segments.length !== 3) {
      return undefined;
    }
    const [encodedHeader, encodedPayload, encodedSignature] = segments;
    if (!encodedHeader || !encodedPayload || !encodedSignature) {
      return undefined;
    }

    const expected = Buffer.from(this.signature(`${encodedHeader}.${encodedPayload}`));
    const presented = Buffer.from(encodedSignature);
    if (expected.length !== presented.length || !timingSafeEqual(expected, presented)) {
      return undefined;
    }

    const header = parseSegment(encodedHeader);
    if (!header || header.alg !== TOKEN_HEADER.alg || header.typ !== TOKEN_HEADER.typ) {
      return undefined;
    }

    const payload = parseSegment(encodedPayload);
    if (!payload) {
      return undefined;
    }
    return toClaims(payload, this.issuer);
  }
}

export const createSessionTokenService = (options: SessionTokenServiceOptions): SessionTokenService =>
  new SessionTokenService(options);

const toBase64Url = (input: string | Buffer): string =>
  Buffer.from(input)
    .toString("base64")
    .replace(/=/g, "")
    .replace(/\+/g, "-")
    .replace(/\//g, "_");

const parseSegment = (segment: string): Record<string, unknown> | undefined => {
  try {
    const parsed: unknown = JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toClaims = (payload: Record<string, unknown>, issuer: string): SessionTokenClaims | undefined => {
  const { iss, sub, iat, exp, jti, token_type: tokenType } = payload;
  if (
    typeof iss !== "string" ||
    iss !== issuer ||
    typeof sub !== "string" ||
    typeof iat !== "number" ||
    typeof exp !== "number" ||
    typeof jti !== "string" ||
    tokenType !== "session"
  ) {
    return undefined;
  }
  return { iss, sub, iat, exp, jti, token_type: tokenType };
};
