export { createSaltedSha256Hasher } from "./password-hasher.js";
export type { SaltedSha256HasherOptions } from "./password-hasher.js";
export { CredentialVerifier } from "./credential-verifier.js";
export type { CredentialVerifierDependencies } from "./credential-verifier.js";
export { RegistrationService, createRegistrationService } from "./registration.js";
export type {
  DefaultAdminInput,
  DefaultAdminOutcome,
  RegistrationPolicy,
  RegistrationServiceDependencies,
} from "./registration.js";
