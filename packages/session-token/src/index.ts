export { SessionTokenService, createSessionTokenService, DEFAULT_SESSION_TTL_SECONDS } from "./session-token-service.js";
export type { SessionTokenServiceOptions } from "./types.js";
