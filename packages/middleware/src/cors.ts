import { getHeader, text } from "@waymark/router";
import type { Middleware, RouteRequest, RouteResponse } from "@waymark/router";

/** Decides, from the request's `Origin` header, whether the response may be shared */
export type OriginMatcher = string | string[] | ((origin: string) => boolean);

/**
 * Settings for {@link cors}. Every field is optional.
 */
export interface CorsOptions {
	/**
	 * `"*"` accepts every origin. A string or list accepts those exact origins; a function
	 * receives the `Origin` header ("" when absent). An accepted origin is echoed back in
	 * `Access-Control-Allow-Origin`.
	 * @default "*"
	 */
	origin?: OriginMatcher;

	/**
	 * Sent as `Access-Control-Allow-Methods` on preflight responses.
	 * @default ["GET", "HEAD", "PUT", "PATCH", "POST", "DELETE"]
	 */
	allowMethods?: string[];

	/**
	 * Sent as `Access-Control-Allow-Headers` on preflight responses.
	 * @default ["Content-Type", "Authorization"]
	 */
	allowHeaders?: string[];

	/** Sent as `Access-Control-Expose-Headers` when the origin is accepted. */
	exposeHeaders?: string[];

	/** Adds `Access-Control-Allow-Credentials: true` for accepted origins. */
	credentials?: boolean;

	/**
	 * Seconds, sent as `Access-Control-Max-Age` on preflight responses. `0` omits the header.
	 * @default 86400
	 */
	maxAge?: number;

	/**
	 * When true an `OPTIONS` request runs the rest of the chain (the matched route's
	 * handlers) and gets the CORS headers merged into that response.
	 */
	preflightContinue?: boolean;

	/**
	 * Status of the response built for an `OPTIONS` request when `preflightContinue` is off.
	 * @default 204
	 */
	optionsSuccessStatus?: number;
}

const DEFAULT_METHODS = ["GET", "HEAD", "PUT", "PATCH", "POST", "DELETE"];
const DEFAULT_HEADERS = ["Content-Type", "Authorization"];

/**
 * CORS middleware to handle Cross-Origin Resource Sharing requests.
 *
 * Preflight requests only reach the chain when some route matches them, so pair it
 * with an `OPTIONS` or `any()` route:
 *
 * @example
 * ```typescript
 * router.group('/api', (api) => {
 *   api.use(cors({ origin: ['https://app.example.com'] }));
 *   api.options('/*', () => text(''));
 *   api.get('/users', listUsers);
 * });
 * ```
 */
export function cors<R extends RouteRequest = RouteRequest>(options: CorsOptions = {}): Middleware<R> {
	const {
		origin: originMatcher = "*",
		allowMethods = DEFAULT_METHODS,
		allowHeaders = DEFAULT_HEADERS,
		exposeHeaders,
		credentials = false,
		maxAge = 86400,
		preflightContinue = false,
		optionsSuccessStatus = 204,
	} = options;

	return (req, next) => {
		const origin = getHeader(req, "Origin") || "";
		const allowed: Record<string, string> = {};

		if (checkOrigin(origin, originMatcher)) {
			allowed["Access-Control-Allow-Origin"] = origin || "*";

			if (credentials) {
				allowed["Access-Control-Allow-Credentials"] = "true";
			}

			if (exposeHeaders?.length) {
				allowed["Access-Control-Expose-Headers"] = exposeHeaders.join(", ");
			}
		}

		if (req.method === "OPTIONS") {
			if (allowMethods.length) {
				allowed["Access-Control-Allow-Methods"] = allowMethods.join(", ");
			}

			if (allowHeaders.length) {
				allowed["Access-Control-Allow-Headers"] = allowHeaders.join(", ");
			}

			if (maxAge) {
				allowed["Access-Control-Max-Age"] = maxAge.toString();
			}

			if (!preflightContinue) {
				return text("", optionsSuccessStatus, allowed);
			}
		}

		return withHeaders(next(), allowed);
	};
}

function withHeaders(response: RouteResponse, headers: Record<string, string>): RouteResponse {
	Object.assign(response.headers, headers);
	return response;
}

function checkOrigin(origin: string, allowed: OriginMatcher): boolean {
	if (allowed === "*") return true;
	if (typeof allowed === "string") return origin === allowed;
	if (Array.isArray(allowed)) return allowed.includes(origin);
	return allowed(origin);
}
