import { emptyResponse } from "./response";
import type { Middleware, RouteRequest, RouteResponse } from "./types";

/**
 * Runs `stages` in order against `req`, continuation style.
 *
 * Stage `i` receives a `next` that runs stage `i + 1` and returns its response.
 * Calling `next` past the last stage yields an empty 200 response.
 * Nothing thrown by a stage is caught here.
 *
 * @param stages - Global middleware followed by the matched route's handlers
 * @param req - Request with its params already attached
 *
 * @example
 * ```typescript
 * const res = runChain([logRequest, (req) => text(`user ${req.params.id}`)], req);
 * ```
 */
export function runChain<R extends RouteRequest>(stages: readonly Middleware<R>[], req: R): RouteResponse {
	const invoke = (index: number): RouteResponse => {
		if (index >= stages.length) {
			return emptyResponse();
		}
		return stages[index](req, () => invoke(index + 1));
	};

	return invoke(0);
}
