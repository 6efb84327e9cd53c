import type { Counter } from "@opentelemetry/api";

import type { AuthCoreConfig, AuthScheme } from "@credential-core/config";
import {
  err,
  ok,
  type AuthContext,
  type AuthFailure,
  type CoreError,
  type CredentialStorePort,
  type IssuedSession,
  type PasswordHasherPort,
  type PersistenceError,
  type PublicCredential,
  type RegistrationError,
  type RegistrationInput,
  type Result,
  type Role,
} from "@credential-core/contracts";
import {
  CredentialVerifier,
  createRegistrationService,
  createSaltedSha256Hasher,
  type DefaultAdminOutcome,
  type RegistrationService,
} from "@credential-core/credentials";
import { createRoleGate, type RoleGate, type RoleRule } from "@credential-core/policy-role";
import { createSessionTokenService, type SessionTokenService } from "@credential-core/session-token";
import { createCoreCounter, createCoreLogger, type CoreLogger } from "@credential-core/telemetry";

import { extractCredentials } from "./credentials-extractor.js";
import { requestError, type AuthenticationError } from "./errors.js";

export interface AuthCoreOptions {
  readonly config: AuthCoreConfig;
  readonly store: CredentialStorePort;
  readonly logger?: CoreLogger;
  readonly rules?: ReadonlyArray<RoleRule>;
  readonly now?: () => Date;
}

export type LoginSuccess =
  | { readonly scheme: "basic"; readonly context: AuthContext }
  | { readonly scheme: "bearer"; readonly context: AuthContext; readonly session: IssuedSession };

export interface AccessRequirement {
  readonly requiredRole?: Role;
  readonly action?: string;
}

export interface AuthCore {
  readonly config: AuthCoreConfig;
  readonly scheme: AuthScheme;
  readonly logger: CoreLogger;
  readonly store: CredentialStorePort;
  readonly hasher: PasswordHasherPort;
  readonly verifier: CredentialVerifier;
  readonly registration: RegistrationService;
  readonly sessions?: SessionTokenService;
  readonly gate: RoleGate;
  start(): Promise<Result<DefaultAdminOutcome | "skipped", RegistrationError | PersistenceError>>;
  stop(): Promise<void>;
  authenticate(authorization: string | null | undefined): Promise<Result<AuthContext, AuthenticationError>>;
  login(username: string, password: string): Promise<Result<LoginSuccess, CoreError>>;
  register(input: RegistrationInput): Promise<Result<PublicCredential, RegistrationError | PersistenceError>>;
  authorize(context: AuthContext, requirement: AccessRequirement): Result<AuthContext, AuthFailure>;
}

export const createAuthCore = (options: AuthCoreOptions): AuthCore => {
  const { config, store } = options;
  const logger = options.logger ?? createCoreLogger({ level: config.logLevel });
  const hasher = createSaltedSha256Hasher({ salt: config.salt });
  const verifier = new CredentialVerifier({ store, hasher, logger });
  const registration = createRegistrationService({
    store,
    hasher,
    logger,
    policy: {
      minUsernameLength: config.minUsernameLength,
      minPasswordLength: config.minPasswordLength,
      roleAware: config.roleAware,
      logRegistrations: config.logRegistrations,
    },
  });
  const gate = createRoleGate({ rules: options.rules, logger });
  const sessions = createSessions(options, logger);
  const loginCounter: Counter = createCoreCounter("credential_core_logins_total", {
    description: "Login attempts by outcome",
  });

  const authenticate = async (
    authorization: string | null | undefined,
  ): Promise<Result<AuthContext, AuthenticationError>> => {
    const presented = extractCredentials(authorization);
    if (!presented || presented.scheme !== config.scheme) {
      return err(
        requestError("request.missing_credentials", "No usable credentials were presented", {
          expectedScheme: config.scheme,
        }),
      );
    }

    if (presented.scheme === "basic") {
      return verifier.verify(presented.username, presented.password);
    }

    if (!sessions) {
      return err(requestError("request.missing_credentials", "Bearer tokens are not enabled"));
    }
    return sessions.validate(presented.token);
  };

  const login = async (username: string, password: string): Promise<Result<LoginSuccess, CoreError>> => {
    const verified = await verifier.verify(username, password);
    if (!verified.ok) {
      loginCounter.add(1, { outcome: verified.error.code });
      return verified;
    }

    if (!sessions) {
      loginCounter.add(1, { outcome: "success" });
      logger.info("login.succeeded", { username, scheme: "basic" });
      return ok({ scheme: "basic", context: verified.value });
    }

    const issued = await sessions.issue(username);
    if (!issued.ok) {
      loginCounter.add(1, { outcome: issued.error.code });
      logger.error("login.token_issue_failed", { username, code: issued.error.code });
      return issued;
    }

    loginCounter.add(1, { outcome: "success" });
    logger.info("login.succeeded", { username, scheme: "bearer", expiresAt: issued.value.expiresAt });
    return ok({ scheme: "bearer", context: verified.value, session: issued.value });
  };

  const authorize = (context: AuthContext, requirement: AccessRequirement): Result<AuthContext, AuthFailure> => {
    const byRole = gate.authorize(context, requirement.requiredRole);
    if (!byRole.ok || !requirement.action) {
      return byRole;
    }
    return gate.authorizeAction(context, requirement.action);
  };

  const start = async (): Promise<
    Result<DefaultAdminOutcome | "skipped", RegistrationError | PersistenceError>
  > => {
    await store.open();
    if (!config.defaultAdmin) {
      return ok("skipped");
    }
    const seeded = await registration.ensureDefaultAdmin(config.defaultAdmin);
    if (!seeded.ok) {
      logger.error("startup.default_admin_failed", { code: seeded.error.code });
    }
    return seeded;
  };

  return {
    config,
    scheme: config.scheme,
    logger,
    store,
    hasher,
    verifier,
    registration,
    sessions,
    gate,
    start,
    stop: () => store.close(),
    authenticate,
    login,
    register: (input) => registration.register(input),
    authorize,
  };
};

const createSessions = (options: AuthCoreOptions, logger: CoreLogger): SessionTokenService | undefined => {
  const { config } = options;
  if (config.scheme !== "bearer") {
    return undefined;
  }
  if (!config.signingKey) {
    throw new Error("Bearer scheme requires a signing key");
  }
  return createSessionTokenService({
    store: options.store,
    signingKey: config.signingKey,
    issuer: config.issuer,
    ttlSeconds: config.tokenTtlSeconds,
    now: options.now,
    logger,
  });
};
