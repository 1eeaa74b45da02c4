import { getHeader, json } from "@waymark/router";
import type { Middleware, RouteRequest } from "@waymark/router";

/**
 * What a token check may return: `false` rejects the request, `true` accepts it
 * without user data, a record accepts it and describes the caller.
 */
export type TokenCheckResult = boolean | Record<string, unknown>;

/**
 * Settings for {@link bearerAuth}.
 */
export interface BearerAuthOptions<R extends RouteRequest = RouteRequest> {
	/**
	 * Checks the token taken from `Authorization: Bearer <token>`. Runs synchronously
	 * inside the chain; a throw is answered with 500.
	 */
	validate: (token: string, req: R) => TokenCheckResult;

	/**
	 * Scheme named in the `WWW-Authenticate` challenge of 401 responses.
	 * @default "Bearer"
	 */
	scheme?: string;

	/** Appended to the challenge of a request with no token as `realm="..."`. */
	realm?: string;

	/**
	 * Property of `req.state` that receives the accepted caller.
	 * @default "user"
	 */
	contextKey?: string;

	/** @default "Authorization token required" */
	missingTokenMessage?: string;

	/** @default "Invalid or expired token" */
	invalidTokenMessage?: string;
}

/**
 * Guards later stages behind an `Authorization: Bearer <token>` check.
 *
 * Requests without a valid token are answered with 401 and never reach later stages.
 * On success the user record (or `{}` when `validate` returned `true`) is stored on
 * `req.state[contextKey]`.
 *
 * @example
 * ```typescript
 * // Simple token validation
 * router.use(bearerAuth({
 *   validate: (token) => token === "test-api-key"
 * }));
 *
 * // Token lookup with user data
 * router.use(bearerAuth({
 *   validate: (token) => {
 *     const session = sessions.get(token);
 *     return session ? { id: session.userId } : false;
 *   },
 *   contextKey: "currentUser"
 * }));
 * ```
 */
export function bearerAuth<R extends RouteRequest = RouteRequest>(options: BearerAuthOptions<R>): Middleware<R> {
	const {
		validate,
		scheme = "Bearer",
		realm,
		contextKey = "user",
		missingTokenMessage = "Authorization token required",
		invalidTokenMessage = "Invalid or expired token",
	} = options;

	return (req, next) => {
		const auth = getHeader(req, "Authorization");

		if (!auth || !auth.startsWith("Bearer ")) {
			let challenge = scheme;
			if (realm) {
				challenge += ` realm="${realm}"`;
			}
			return json({ error: missingTokenMessage }, 401, { "WWW-Authenticate": challenge });
		}

		const token = auth.slice(7);
		if (!token.trim()) {
			return json({ error: missingTokenMessage }, 401, { "WWW-Authenticate": scheme });
		}

		let result: TokenCheckResult;
		try {
			result = validate(token, req);
		} catch {
			return json({ error: invalidTokenMessage }, 500, { "WWW-Authenticate": scheme });
		}

		if (result === false) {
			return json({ error: invalidTokenMessage }, 401, { "WWW-Authenticate": scheme });
		}

		const state = (req.state ??= {});
		state[contextKey] = result === true ? {} : result;

		return next();
	};
}
