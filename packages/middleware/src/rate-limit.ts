import { Algorithm, RateLimiter } from "@rabbit-company/rate-limiter";
import type { RateLimitConfig, RateLimitResult } from "@rabbit-company/rate-limiter";
import { getHeader, json } from "@waymark/router";
import type { Middleware, RouteRequest } from "@waymark/router";

/**
 * Configuration options for rate limiting middleware.
 *
 * @example
 * ```typescript
 * const options: RateLimitOptions = {
 *   algorithm: Algorithm.SLIDING_WINDOW,
 *   windowMs: 60000,
 *   max: 100,
 *   headers: true
 * };
 * ```
 */
export interface RateLimitOptions<R extends RouteRequest = RouteRequest> {
	/**
	 * Rate limiting algorithm to use.
	 *
	 * @default Algorithm.FIXED_WINDOW
	 */
	algorithm?: Algorithm;
	/**
	 * Window duration in milliseconds for fixed or sliding window algorithms.
	 *
	 * @default 60000 (1 minute)
	 */
	windowMs?: number;
	/**
	 * Maximum number of requests per window, or bucket capacity for the token bucket algorithm.
	 *
	 * @default 60
	 */
	max?: number;
	/**
	 * Tokens added per refill interval (token bucket only).
	 *
	 * @default 1
	 */
	refillRate?: number;
	/**
	 * Refill interval in milliseconds (token bucket only).
	 *
	 * @default 1000
	 */
	refillInterval?: number;
	/**
	 * Time precision in milliseconds (sliding window only).
	 *
	 * @default 100
	 */
	precision?: number;
	/**
	 * Error message returned when the limit is exceeded.
	 *
	 * @default "Too many requests"
	 */
	message?: string;
	/**
	 * Status code returned when the limit is exceeded.
	 *
	 * @default 429
	 */
	statusCode?: number;
	/**
	 * Whether to add `RateLimit-Limit`, `RateLimit-Remaining`, `RateLimit-Reset`,
	 * `RateLimit-Algorithm` and, when limited, `Retry-After` headers.
	 *
	 * @default true
	 */
	headers?: boolean;
	/**
	 * Identifies who is being limited.
	 *
	 * @default The request's `clientIp`, then its `X-Forwarded-For` header, then "unknown"
	 */
	keyGenerator?: (req: R) => string;
	/**
	 * Identifies what is being limited.
	 *
	 * @default "METHOD:path"
	 */
	endpointGenerator?: (req: R) => string;
	/**
	 * Requests for which this returns true are not counted.
	 */
	skip?: (req: R) => boolean;
	/**
	 * Interval in milliseconds between sweeps of expired entries.
	 *
	 * @default 30000
	 */
	cleanupInterval?: number;
	/**
	 * Whether expired entries are swept periodically.
	 *
	 * @default true
	 */
	enableCleanup?: boolean;
	/**
	 * Shared limiter instance; the algorithm options above are ignored when set.
	 */
	rateLimiter?: RateLimiter;
}

/**
 * Rate limiting middleware backed by @rabbit-company/rate-limiter.
 *
 * Requests over the limit are answered directly with a JSON error and never reach
 * later stages. Allowed requests get rate limit headers on whatever response the
 * rest of the chain returns.
 *
 * @example
 * ```typescript
 * router.use(rateLimit({ max: 100, windowMs: 60 * 1000 }));
 *
 * router.group('/auth', (auth) => {
 *   auth.use(rateLimit({
 *     algorithm: Algorithm.SLIDING_WINDOW,
 *     max: 5,
 *     windowMs: 15 * 60 * 1000,
 *     keyGenerator: (req) => req.headers?.['x-api-key'] ?? 'anonymous',
 *   }));
 *   auth.post('/login', login);
 * });
 * ```
 */
export function rateLimit<R extends RouteRequest = RouteRequest>(options: RateLimitOptions<R> = {}): Middleware<R> {
	const {
		algorithm = Algorithm.FIXED_WINDOW,
		windowMs = 60 * 1000,
		max = 60,
		refillRate = 1,
		refillInterval = 1000,
		precision = 100,
		message = "Too many requests",
		statusCode = 429,
		headers = true,
		keyGenerator = defaultKeyGenerator,
		endpointGenerator = defaultEndpointGenerator,
		skip,
		cleanupInterval = 30 * 1000,
		enableCleanup = true,
		rateLimiter,
	} = options;

	const limiter =
		rateLimiter ||
		new RateLimiter({
			algorithm,
			window: windowMs,
			max,
			refillRate,
			refillInterval,
			precision,
			cleanupInterval,
			enableCleanup,
		} as RateLimitConfig);

	return (req, next) => {
		if (skip && skip(req)) {
			return next();
		}

		const result: RateLimitResult = limiter.check(endpointGenerator(req), keyGenerator(req));

		const limitHeaders: Record<string, string> = headers
			? {
					"RateLimit-Limit": result.limit.toString(),
					"RateLimit-Remaining": result.remaining.toString(),
					"RateLimit-Reset": Math.ceil(result.reset / 1000).toString(),
					"RateLimit-Algorithm": algorithm,
				}
			: {};

		if (result.limited) {
			const retryAfter = Math.ceil((result.reset - Date.now()) / 1000);

			if (headers) {
				limitHeaders["Retry-After"] = retryAfter.toString();
			}

			return json(
				{
					error: message,
					retryAfter,
					limit: result.limit,
					window: result.window,
					reset: new Date(result.reset).toISOString(),
				},
				statusCode,
				limitHeaders
			);
		}

		const response = next();
		Object.assign(response.headers, limitHeaders);
		return response;
	};
}

function defaultKeyGenerator(req: RouteRequest): string {
	return req.clientIp || getHeader(req, "X-Forwarded-For")?.split(",")[0]?.trim() || "unknown";
}

function defaultEndpointGenerator(req: RouteRequest): string {
	return `${req.method}:${req.path}`;
}

/**
 * Creates a limiter that several `rateLimit()` stages can share.
 *
 * @example
 * ```typescript
 * const apiLimiter = createRateLimiter({ window: 60 * 1000, max: 100 });
 *
 * router.group('/api/users', (users) => users.use(rateLimit({ rateLimiter: apiLimiter })));
 * router.group('/api/posts', (posts) => posts.use(rateLimit({ rateLimiter: apiLimiter })));
 * ```
 */
export function createRateLimiter(config?: Partial<RateLimitConfig>): RateLimiter {
	return new RateLimiter(config);
}

export { Algorithm, RateLimiter } from "@rabbit-company/rate-limiter";
export type { RateLimitConfig, RateLimitResult } from "@rabbit-company/rate-limiter";
