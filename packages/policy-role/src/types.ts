import type { Role } from "@credential-core/contracts";
import type { CoreLogger } from "@credential-core/telemetry";

/** Maps an action pattern such as `products.create` or `admin.*` to the role it needs. */
export interface RoleRule {
  readonly action: string;
  readonly role: Role;
}

export interface RoleGateOptions {
  readonly rules?: ReadonlyArray<RoleRule>;
  readonly logger?: CoreLogger;
}
