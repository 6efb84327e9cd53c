import type { CredentialStorePort } from "@credential-core/contracts";
import type { CoreLogger } from "@credential-core/telemetry";

export interface SessionTokenServiceOptions {
  readonly store: CredentialStorePort;
  readonly signingKey: string;
  readonly issuer: string;
  readonly ttlSeconds?: number;
  readonly now?: () => Date;
  readonly jtiFactory?: () => string;
  readonly logger?: CoreLogger;
}
