export { createAuthCore } from "./auth-core.js";
export type { AccessRequirement, AuthCore, AuthCoreOptions, LoginSuccess } from "./auth-core.js";
export { createAuthHandler, jsonResponse } from "./auth-handler.js";
export type { AuthHandlerMetrics, AuthHandlerOptions, HttpMethod, ProtectedRoute } from "./auth-handler.js";
export { encodeBasicCredentials, extractCredentials } from "./credentials-extractor.js";
export type { PresentedCredentials } from "./credentials-extractor.js";
export { requestError } from "./errors.js";
export type { AuthenticationError, RequestError, RequestErrorCode } from "./errors.js";
export { describeFailure } from "./failure-response.js";
export type { FailureDescription } from "./failure-response.js";
export { createExpressAuthMiddleware } from "./express.js";
export type { AuthCoreLike, ExpressNextFunction, ExpressRequestLike, ExpressResponseLike } from "./express.js";
