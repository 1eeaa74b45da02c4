/** Reason codes carried by {@link RouteDefinitionError}. */
export type RouteDefinitionErrorCode =
	| "INVALID_PATH"
	| "MISSING_HANDLER"
	| "INVALID_HANDLER"
	| "INVALID_MIDDLEWARE"
	| "INVALID_PREFIX"
	| "INVALID_BUILDER"
	| "INVALID_ROUTER"
	| "INVALID_RESOURCE"
	| "INVALID_CONTROLLER";

/**
 * Thrown synchronously by registration methods when they are called with arguments
 * that cannot form a route. Nothing is registered by the failing call.
 */
export class RouteDefinitionError extends Error {
	readonly code: RouteDefinitionErrorCode;

	constructor(message: string, code: RouteDefinitionErrorCode) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
	}
}
