import type { Counter } from "@opentelemetry/api";

import {
  authFailure,
  err,
  ok,
  toAuthContext,
  type AuthContext,
  type AuthFailure,
  type CredentialStorePort,
  type PasswordHasherPort,
  type PersistenceError,
  type Result,
} from "@credential-core/contracts";
import { createCoreCounter, createSilentLogger, type CoreLogger } from "@credential-core/telemetry";

export interface CredentialVerifierDependencies {
  readonly store: CredentialStorePort;
  readonly hasher: PasswordHasherPort;
  readonly logger?: CoreLogger;
  readonly verificationCounter?: Counter;
}

export class CredentialVerifier {
  private readonly store: CredentialStorePort;
  private readonly hasher: PasswordHasherPort;
  private readonly logger: CoreLogger;
  private readonly verificationCounter: Counter;

  constructor(dependencies: CredentialVerifierDependencies) {
    this.store = dependencies.store;
    this.hasher = dependencies.hasher;
    this.logger = (dependencies.logger ?? createSilentLogger()).child({ component: "credential_verifier" });
    this.verificationCounter =
      dependencies.verificationCounter ??
      createCoreCounter("credential_core_verifications_total", {
        description: "Password verifications by outcome",
      });
  }

  /**
   * Checks a presented password against the live store. `auth.unknown_user` and `auth.bad_secret`
   * are told apart here and in the logs only; the boundary reports both the same way.
   */
  async verify(
    username: string,
    presentedSecret: string,
  ): Promise<Result<AuthContext, AuthFailure | PersistenceError>> {
    const loaded = await this.store.load();
    if (!loaded.ok) {
      return loaded;
    }

    const record = loaded.value.get(username);
    if (!record) {
      this.logger.warn("credentials.unknown_user", { username });
      this.verificationCounter.add(1, { outcome: "unknown_user" });
      return err(authFailure("auth.unknown_user"));
    }

    if (!this.hasher.matches(presentedSecret, record.secretDigest)) {
      this.logger.warn("credentials.bad_secret", { username });
      this.verificationCounter.add(1, { outcome: "bad_secret" });
      return err(authFailure("auth.bad_secret"));
    }

    this.verificationCounter.add(1, { outcome: "success" });
    return ok(toAuthContext(record));
  }
}
