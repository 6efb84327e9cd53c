export * from "./types/domain-error.js";
export * from "./types/result.js";
export * from "./types/credential.js";
export * from "./types/errors.js";
export * from "./types/token.js";

export * from "./ports/store/credential-store-port.js";
export * from "./ports/hashing/password-hasher-port.js";
export * from "./ports/tokens/session-token-port.js";
export * from "./ports/policy/authorization-gate-port.js";
export * from "./concurrency/writer-lock.js";
