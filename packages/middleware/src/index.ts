export { bearerAuth } from "./bearer-auth";
export type { BearerAuthOptions, TokenCheckResult } from "./bearer-auth";
export { cors } from "./cors";
export type { CorsOptions, OriginMatcher } from "./cors";
export { errorHandler } from "./error-handler";
export type { ErrorHandlerOptions } from "./error-handler";
export { ConsoleTransport, Levels, Logger, logger } from "./logger";
export type { LoggerOptions, LogWriter } from "./logger";
export { Algorithm, createRateLimiter, RateLimiter, rateLimit } from "./rate-limit";
export type { RateLimitConfig, RateLimitOptions, RateLimitResult } from "./rate-limit";
