import { runChain } from "./chain";
import { RouteDefinitionError } from "./errors";
import { compilePattern } from "./pattern";
import { notFound } from "./response";
import { ANY } from "./types";
import type { Controller, ControllerAction, Method, Middleware, ResourceAction, Route, RouteMatch, RouteMethod, RouteRequest, RouteResponse } from "./types";

/** Package version */
export const VERSION = "0.1.0";

/**
 * Conventional REST routes generated by {@link Router.resources}, in registration order.
 * Each path is `/` + resource name + `suffix`.
 */
const RESOURCE_ROUTES: ReadonlyArray<{ action: ResourceAction; method: Method; suffix: string }> = [
	{ action: "index", method: "GET", suffix: "" },
	{ action: "new", method: "GET", suffix: "/new" },
	{ action: "create", method: "POST", suffix: "" },
	{ action: "show", method: "GET", suffix: "/:id" },
	{ action: "edit", method: "GET", suffix: "/:id/edit" },
	{ action: "update", method: "PUT", suffix: "/:id" },
	{ action: "destroy", method: "DELETE", suffix: "/:id" },
];

/**
 * Request router with first-match route lookup and continuation-style middleware chains.
 *
 * Features:
 * - `:param` and `*wildcard` path templates
 * - Routes are tried in registration order; the first one that matches wins
 * - Global middleware runs before every matched route's own handlers
 * - Prefix groups with group-local middleware
 * - Conventional REST routes from a controller
 *
 * Dispatch is synchronous: every stage returns its response directly.
 *
 * @template R - The request type handed in by the transport
 *
 * @example
 * ```typescript
 * const router = new Router();
 *
 * router.use((req, next) => {
 *   const res = next();
 *   res.headers['X-Powered-By'] = 'waymark';
 *   return res;
 * });
 *
 * router.get('/users/:id', (req) => json({ id: req.params.id }));
 *
 * router.group('/admin', (admin) => {
 *   admin.use(requireAdmin);
 *   admin.get('/stats', (req) => json(stats()));
 * });
 *
 * const res = router.dispatch({ method: 'GET', path: '/users/42', params: {} });
 * ```
 */
export class Router<R extends RouteRequest = RouteRequest> {
	/** Registered routes in match priority order */
	private routes: Route<R>[] = [];
	/** Global middleware in registration order */
	private middlewares: Middleware<R>[] = [];

	/**
	 * Creates a new, empty router
	 */
	constructor() {
		this.dispatch = this.dispatch.bind(this);
	}

	/**
	 * Registers a global middleware. Global middleware runs, in registration order,
	 * before the handlers of whichever route matched. Inside a group it only runs
	 * for routes declared in that group.
	 *
	 * @param middleware - Stage to append
	 * @returns The Router instance for method chaining
	 * @throws {RouteDefinitionError} When `middleware` is not a function
	 *
	 * @example
	 * ```typescript
	 * router.use((req, next) => {
	 *   console.log(`${req.method} ${req.path}`);
	 *   return next();
	 * });
	 * ```
	 */
	use(middleware: Middleware<R>): this {
		if (typeof middleware !== "function") {
			throw new RouteDefinitionError("Middleware must be a function", "INVALID_MIDDLEWARE");
		}

		this.middlewares.push(middleware);
		return this;
	}

	/**
	 * Adds a route with the specified method, path, and handlers.
	 * The last handler is the terminal handler; any before it act as route-local middleware.
	 *
	 * @param method - HTTP method, or `*` for any method
	 * @param path - Path template (supports `:param` and `*wildcard`)
	 * @param handlers - One or more stages for this route
	 * @returns The Router instance for method chaining
	 * @throws {RouteDefinitionError} When the path is not a string, no handler is given, or a handler is not a function
	 *
	 * @example
	 * ```typescript
	 * router.add('GET', '/users/:id', (req) => json({ id: req.params.id }));
	 * ```
	 */
	add(method: RouteMethod, path: string, ...handlers: Middleware<R>[]): this {
		if (handlers.length === 0) {
			throw new RouteDefinitionError(`Route ${method} ${String(path)} must have at least one handler`, "MISSING_HANDLER");
		}

		handlers.forEach((handler, index) => {
			if (typeof handler !== "function") {
				throw new RouteDefinitionError(`Handler ${index + 1} of route ${method} ${String(path)} must be a function`, "INVALID_HANDLER");
			}
		});

		const pattern = compilePattern(path);

		this.routes.push(
			Object.freeze({
				method,
				path,
				pattern,
				handlers: Object.freeze([...handlers]),
			})
		);
		return this;
	}

	/**
	 * Registers a GET route.
	 *
	 * @example
	 * ```typescript
	 * router.get('/users/:id', (req) => json(findUser(req.params.id)));
	 * ```
	 */
	get(path: string, ...handlers: Middleware<R>[]): this {
		return this.add("GET", path, ...handlers);
	}

	/**
	 * Registers a POST route.
	 */
	post(path: string, ...handlers: Middleware<R>[]): this {
		return this.add("POST", path, ...handlers);
	}

	/**
	 * Registers a PUT route.
	 */
	put(path: string, ...handlers: Middleware<R>[]): this {
		return this.add("PUT", path, ...handlers);
	}

	/**
	 * Registers a DELETE route.
	 */
	delete(path: string, ...handlers: Middleware<R>[]): this {
		return this.add("DELETE", path, ...handlers);
	}

	/**
	 * Registers a PATCH route.
	 */
	patch(path: string, ...handlers: Middleware<R>[]): this {
		return this.add("PATCH", path, ...handlers);
	}

	/**
	 * Registers a HEAD route.
	 */
	head(path: string, ...handlers: Middleware<R>[]): this {
		return this.add("HEAD", path, ...handlers);
	}

	/**
	 * Registers an OPTIONS route.
	 */
	options(path: string, ...handlers: Middleware<R>[]): this {
		return this.add("OPTIONS", path, ...handlers);
	}

	/**
	 * Registers a route that matches every method.
	 *
	 * @example
	 * ```typescript
	 * // Registered last, so it only sees requests no other route matched
	 * router.any('*', (req) => html(`<h1>${req.path} not found</h1>`, 404));
	 * ```
	 */
	any(path: string, ...handlers: Middleware<R>[]): this {
		return this.add(ANY, path, ...handlers);
	}

	/**
	 * Declares a batch of routes under a path prefix.
	 *
	 * `builder` receives a fresh router. Routes and middleware registered on it are
	 * flattened into this router once `builder` returns: each route's path becomes
	 * `prefix + path` (plain concatenation, slashes are not added or removed) and the
	 * group's middleware is placed in front of the route's own handlers, so it never
	 * runs for routes outside the group. Groups nest.
	 *
	 * @param prefix - Path prefix for every route in the group
	 * @param builder - Function that registers the group's routes
	 * @returns The Router instance for method chaining
	 * @throws {RouteDefinitionError} When the prefix is not a string or the builder is not a function
	 *
	 * @example
	 * ```typescript
	 * router.group('/api/v1', (api) => {
	 *   api.use(cors());
	 *   api.get('/users', listUsers);
	 *   api.post('/users', createUser);
	 * });
	 * // Routes are available at /api/v1/users
	 * ```
	 */
	group(prefix: string, builder: (group: Router<R>) => void): this {
		if (typeof prefix !== "string") {
			throw new RouteDefinitionError("Group prefix must be a string", "INVALID_PREFIX");
		}
		if (typeof builder !== "function") {
			throw new RouteDefinitionError("Group builder must be a function", "INVALID_BUILDER");
		}

		const group = new Router<R>();
		builder(group);

		return this.mount(prefix, group);
	}

	/**
	 * Copies every route of another router into this one under a path prefix.
	 * The other router's global middleware is prepended to each copied route's handlers.
	 * Later changes to `router` are not reflected here.
	 *
	 * @param prefix - Path prefix to mount the routes at
	 * @param router - Router whose routes are copied
	 * @returns The Router instance for method chaining
	 * @throws {RouteDefinitionError} When the prefix is not a string or `router` is not a Router
	 *
	 * @example
	 * ```typescript
	 * const admin = new Router();
	 * admin.get('/dashboard', dashboard);
	 *
	 * router.mount('/admin', admin);
	 * // Dashboard is available at /admin/dashboard
	 * ```
	 */
	mount(prefix: string, router: Router<R>): this {
		if (typeof prefix !== "string") {
			throw new RouteDefinitionError("Mount prefix must be a string", "INVALID_PREFIX");
		}
		if (!(router instanceof Router)) {
			throw new RouteDefinitionError("Only a Router can be mounted", "INVALID_ROUTER");
		}

		// Copied so a router mounted on itself gains each route exactly once
		const routes = [...router.routes];
		const middlewares = [...router.middlewares];
		for (const route of routes) {
			this.add(route.method, prefix + route.path, ...middlewares, ...route.handlers);
		}
		return this;
	}

	/**
	 * Registers the conventional REST routes for a resource. Only actions the controller
	 * defines get a route:
	 *
	 * | action  | method | path            |
	 * |---------|--------|-----------------|
	 * | index   | GET    | /name           |
	 * | new     | GET    | /name/new       |
	 * | create  | POST   | /name           |
	 * | show    | GET    | /name/:id       |
	 * | edit    | GET    | /name/:id/edit  |
	 * | update  | PUT    | /name/:id       |
	 * | destroy | DELETE | /name/:id       |
	 *
	 * @param name - Resource name used as the first path segment
	 * @param controller - Capability bag of actions
	 * @returns The Router instance for method chaining
	 * @throws {RouteDefinitionError} When the name is not a string, the controller is not an object, or an action is not a function
	 *
	 * @example
	 * ```typescript
	 * router.resources('posts', {
	 *   index: () => json(posts),
	 *   show: (req) => json(posts.find((p) => p.id === req.params.id)),
	 * });
	 * ```
	 */
	resources(name: string, controller: Controller<R>): this {
		if (typeof name !== "string") {
			throw new RouteDefinitionError("Resource name must be a string", "INVALID_RESOURCE");
		}
		if (typeof controller !== "object" || controller === null || Array.isArray(controller)) {
			throw new RouteDefinitionError(`Controller for resource ${name} must be an object`, "INVALID_CONTROLLER");
		}

		const rows: Array<{ method: Method; path: string; action: ControllerAction<R> }> = [];
		for (const row of RESOURCE_ROUTES) {
			const action = controller[row.action];
			if (action === undefined) continue;
			if (typeof action !== "function") {
				throw new RouteDefinitionError(`Action ${row.action} of resource ${name} must be a function`, "INVALID_CONTROLLER");
			}
			rows.push({ method: row.method, path: `/${name}${row.suffix}`, action });
		}

		for (const { method, path, action } of rows) {
			this.add(method, path, (req) => action(req));
		}
		return this;
	}

	/**
	 * Lists registered routes in match priority order.
	 *
	 * @example
	 * ```typescript
	 * router.getRoutes().forEach((route) => {
	 *   console.log(`${route.method} ${route.path}`);
	 * });
	 * ```
	 */
	getRoutes(): Array<{ method: RouteMethod; path: string }> {
		return this.routes.map((route) => ({
			method: route.method,
			path: route.path,
		}));
	}

	/**
	 * Finds the first registered route, in registration order, whose method and
	 * path template both match.
	 *
	 * @param method - Request method; routes registered with `any()` match every method
	 * @param path - Request path
	 * @returns The route with its captured params, or null when nothing matches
	 *
	 * @example
	 * ```typescript
	 * const found = router.match('GET', '/users/123');
	 * if (found) {
	 *   console.log(found.params.id); // "123"
	 * }
	 * ```
	 */
	match(method: string, path: string): RouteMatch<R> | null {
		for (const route of this.routes) {
			if (route.method !== method && route.method !== ANY) continue;

			const params = route.pattern.match(path);
			if (params) {
				return { route, params };
			}
		}
		return null;
	}

	/**
	 * Routes a request and runs its chain: global middleware first, then the matched
	 * route's handlers. `req.params` is replaced with the matched route's parameters
	 * before the first stage runs.
	 *
	 * When no route matches, a 404 `text/plain` response with body `Not Found` is
	 * returned and no stage runs. Errors thrown by stages are not caught.
	 *
	 * @param req - Request from the transport
	 * @returns The response produced by the chain
	 */
	dispatch(req: R): RouteResponse {
		const found = this.match(req.method, req.path);
		if (!found) {
			return notFound();
		}

		req.params = found.params;

		return runChain([...this.middlewares, ...found.route.handlers], req);
	}

	/**
	 * Returns a single-argument function equivalent to {@link Router.dispatch}, for handing to a transport.
	 *
	 * @example
	 * ```typescript
	 * serve(router.handler());
	 * ```
	 */
	handler(): (req: R) => RouteResponse {
		return (req) => this.dispatch(req);
	}
}

export { runChain } from "./chain";
export { RouteDefinitionError } from "./errors";
export type { RouteDefinitionErrorCode } from "./errors";
export { compilePattern, DEFAULT_WILDCARD_NAME } from "./pattern";
export { emptyResponse, getHeader, html, json, NOT_FOUND_BODY, notFound, redirect, text } from "./response";
export { ANY } from "./types";
export type * from "./types";
