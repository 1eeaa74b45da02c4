/**
 * HTTP methods a route can be registered for.
 *
 * @example
 * ```typescript
 * const method: Method = 'GET';
 * router.add(method, '/users', handler);
 * ```
 */
export type Method = "GET" | "POST" | "PUT" | "DELETE" | "PATCH" | "OPTIONS" | "HEAD";

/** Method token of routes registered with `any()`; matches every request method. */
export const ANY = "*";

/** Method of a registered route: a concrete HTTP method or the {@link ANY} wildcard. */
export type RouteMethod = Method | typeof ANY;

/** Parameter values captured from the request path, keyed by the name used in the template. */
export type Params = Record<string, string>;

/**
 * Request descriptor handed to the router by the transport.
 * The router reads `method` and `path` and replaces `params` once per dispatch;
 * every other field belongs to the transport and the middleware.
 *
 * @example
 * ```typescript
 * const req: RouteRequest = {
 *   method: 'GET',
 *   path: '/users/42',
 *   params: {},
 *   headers: { authorization: 'Bearer test-token' },
 * };
 * ```
 */
export interface RouteRequest {
	/** HTTP method, compared exactly against registered routes */
	method: string;
	/** Request path without query string */
	path: string;
	/** Parameters of the matched route, written by the router before the first stage runs */
	params: Params;
	/** Request headers as supplied by the transport */
	headers?: Record<string, string>;
	/** Client address, when the transport knows it */
	clientIp?: string;
	/** Scratch space shared between stages of one dispatch */
	state?: Record<string, unknown>;
}

/**
 * Response produced by a stage and written out by the transport.
 *
 * @example
 * ```typescript
 * const res: RouteResponse = {
 *   status: 200,
 *   headers: { 'Content-Type': 'text/plain' },
 *   body: 'Hello',
 * };
 * ```
 */
export interface RouteResponse {
	status: number;
	headers: Record<string, string>;
	body: string;
}

/**
 * Runs the remaining stages of the chain and returns their response.
 * Past the last stage it returns an empty 200 response.
 */
export type Next = () => RouteResponse;

/**
 * A chain stage: global middleware, route-local middleware and terminal handlers all share this shape.
 * A stage may call `next()` and return its result, wrap it, or return its own response without calling `next()`.
 *
 * @template R - The request type the router was created for
 *
 * @example
 * ```typescript
 * const timing: Middleware = (req, next) => {
 *   const start = Date.now();
 *   const res = next();
 *   res.headers['X-Response-Time'] = `${Date.now() - start}ms`;
 *   return res;
 * };
 *
 * const requireUser: Middleware = (req, next) => {
 *   if (!req.headers?.authorization) {
 *     return { status: 401, headers: {}, body: 'Unauthorized' };
 *   }
 *   return next();
 * };
 * ```
 */
export type Middleware<R extends RouteRequest = RouteRequest> = (req: R, next: Next) => RouteResponse;

/**
 * A compiled path template.
 */
export interface CompiledPattern {
	/** The template the pattern was compiled from */
	readonly template: string;
	/** Anchored expression with one capture group per parameter */
	readonly regex: RegExp;
	/** Parameter names in the order their capture groups appear */
	readonly paramNames: readonly string[];
	/**
	 * Matches a whole path against the pattern.
	 * @returns The captured parameters, or null when the path does not match
	 */
	match(path: string): Params | null;
}

/**
 * A registered route. Frozen once registered.
 *
 * @template R - The request type the router was created for
 */
export interface Route<R extends RouteRequest = RouteRequest> {
	/** HTTP method for this route, or `*` for any method */
	readonly method: RouteMethod;
	/** Path template as registered (after group prefixes were applied) */
	readonly path: string;
	/** Compiled form of `path` */
	readonly pattern: CompiledPattern;
	/** Route-local middleware followed by the terminal handler */
	readonly handlers: readonly Middleware<R>[];
}

/**
 * Result of a successful route lookup.
 */
export interface RouteMatch<R extends RouteRequest = RouteRequest> {
	route: Route<R>;
	params: Params;
}

/** Actions a resource controller may expose. */
export type ResourceAction = "index" | "new" | "create" | "show" | "edit" | "update" | "destroy";

/** A controller action; it receives the request only, never the continuation. */
export type ControllerAction<R extends RouteRequest = RouteRequest> = (req: R) => RouteResponse;

/**
 * Capability bag for {@link Router.resources}: every action present gets its conventional route.
 *
 * @example
 * ```typescript
 * const posts: Controller = {
 *   index: () => json(listPosts()),
 *   show: (req) => json(findPost(req.params.id)),
 * };
 * router.resources('posts', posts);
 * ```
 */
export type Controller<R extends RouteRequest = RouteRequest> = Partial<Record<ResourceAction, ControllerAction<R>>>;
