import type { Counter } from "@opentelemetry/api";

import {
  err,
  LOWEST_PRIVILEGE_ROLE,
  ok,
  registrationError,
  toPublicCredential,
  type CredentialProfile,
  type CredentialRecord,
  type CredentialStorePort,
  type PasswordHasherPort,
  type PersistenceError,
  type PublicCredential,
  type RegistrationError,
  type RegistrationInput,
  type Result,
} from "@credential-core/contracts";
import { createCoreCounter, createSilentLogger, type CoreLogger } from "@credential-core/telemetry";

export interface RegistrationPolicy {
  readonly minUsernameLength: number;
  readonly minPasswordLength: number;
  readonly roleAware: boolean;
  readonly logRegistrations?: boolean;
}

export interface RegistrationServiceDependencies {
  readonly store: CredentialStorePort;
  readonly hasher: PasswordHasherPort;
  readonly policy: RegistrationPolicy;
  readonly logger?: CoreLogger;
  readonly registrationCounter?: Counter;
}

export interface DefaultAdminInput {
  readonly username: string;
  readonly password: string;
}

export type DefaultAdminOutcome = "created" | "existing";

// Keys the store owns; a profile must not shadow them.
const RESERVED_PROFILE_KEYS = new Set(["password_hash", "role"]);

const sanitizeProfile = (profile: CredentialProfile | undefined): CredentialProfile => {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(profile ?? {})) {
    if (RESERVED_PROFILE_KEYS.has(key) || value === undefined) {
      continue;
    }
    sanitized[key] = value;
  }
  return sanitized;
};

export class RegistrationService {
  private readonly store: CredentialStorePort;
  private readonly hasher: PasswordHasherPort;
  private readonly policy: Required<RegistrationPolicy>;
  private readonly logger: CoreLogger;
  private readonly registrationCounter: Counter;

  constructor(dependencies: RegistrationServiceDependencies) {
    const { minUsernameLength, minPasswordLength } = dependencies.policy;
    if (!Number.isInteger(minUsernameLength) || minUsernameLength < 1) {
      throw new Error("RegistrationService requires a positive integer minUsernameLength");
    }
    if (!Number.isInteger(minPasswordLength) || minPasswordLength < 1) {
      throw new Error("RegistrationService requires a positive integer minPasswordLength");
    }

    this.store = dependencies.store;
    this.hasher = dependencies.hasher;
    this.policy = {
      ...dependencies.policy,
      logRegistrations: dependencies.policy.logRegistrations ?? true,
    };
    this.logger = (dependencies.logger ?? createSilentLogger()).child({ component: "registration" });
    this.registrationCounter =
      dependencies.registrationCounter ??
      createCoreCounter("credential_core_registrations_total", {
        description: "Registration attempts by outcome",
      });
  }

  /**
   * Validates and persists a new credential. The checks run in a fixed order and the first one
   * that fails decides the error: duplicate, short username, short password.
   */
  async register(
    input: RegistrationInput,
  ): Promise<Result<PublicCredential, RegistrationError | PersistenceError>> {
    const result = await this.store.update((snapshot) => {
      if (snapshot.has(input.username)) {
        return err(registrationError("registration.duplicate_username", "Username already exists"));
      }

      if (input.username.trim().length < this.policy.minUsernameLength) {
        return err(
          registrationError(
            "registration.username_too_short",
            `Username must be at least ${this.policy.minUsernameLength} characters long`,
            { minimum: this.policy.minUsernameLength },
          ),
        );
      }

      if (input.password.length < this.policy.minPasswordLength) {
        return err(
          registrationError(
            "registration.password_too_short",
            `Password must be at least ${this.policy.minPasswordLength} characters long`,
            { minimum: this.policy.minPasswordLength },
          ),
        );
      }

      const record: CredentialRecord = {
        username: input.username,
        secretDigest: this.hasher.hash(input.password),
        ...(this.policy.roleAware ? { role: input.role ?? LOWEST_PRIVILEGE_ROLE } : {}),
        profile: sanitizeProfile(input.profile),
      };

      const next = new Map(snapshot);
      next.set(record.username, record);
      return ok({ next, value: toPublicCredential(record) });
    });

    if (!result.ok) {
      this.registrationCounter.add(1, { outcome: result.error.code });
      this.logger.info("registration.rejected", { username: input.username, code: result.error.code });
      return result;
    }

    this.registrationCounter.add(1, { outcome: "created" });
    if (this.policy.logRegistrations) {
      this.logger.info("registration.created", {
        username: result.value.username,
        ...(result.value.role ? { role: result.value.role } : {}),
      });
    }
    return result;
  }

  /**
   * Seeds an administrator on startup for role-aware deployments. An existing account with the
   * same username is left exactly as it is.
   */
  async ensureDefaultAdmin(
    input: DefaultAdminInput,
  ): Promise<Result<DefaultAdminOutcome, RegistrationError | PersistenceError>> {
    if (!this.policy.roleAware) {
      throw new Error("ensureDefaultAdmin requires a role-aware registration policy");
    }

    const registered = await this.register({ username: input.username, password: input.password, role: "admin" });
    if (registered.ok) {
      this.logger.info("registration.default_admin_created", { username: input.username });
      return ok("created");
    }
    if (registered.error.code === "registration.duplicate_username") {
      return ok("existing");
    }
    return registered;
  }
}

export const createRegistrationService = (dependencies: RegistrationServiceDependencies): RegistrationService =>
  new RegistrationService(dependencies);
