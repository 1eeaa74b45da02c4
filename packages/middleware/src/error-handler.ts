import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
import { json } from "@waymark/router";
import type { Middleware, RouteRequest, RouteResponse } from "@waymark/router";
import type { LogWriter } from "./logger";

/**
 * Options for configuring the error handler middleware.
 */
export interface ErrorHandlerOptions<R extends RouteRequest = RouteRequest> {
	/**
	 * Logger that receives caught errors. If not provided, a console logger will be created.
	 */
	logger?: LogWriter;

	/**
	 * Whether caught errors are logged.
	 * Default: true
	 */
	log?: boolean;

	/**
	 * Whether the error message is included in the response body.
	 * Default: false
	 */
	expose?: boolean;

	/**
	 * Status code of the default error response.
	 * Default: 500
	 */
	status?: number;

	/**
	 * Builds the response for a caught error instead of the default JSON body.
	 */
	render?: (error: unknown, req: R) => RouteResponse;
}

/**
 * Catches anything thrown by later stages and turns it into a response.
 *
 * The router itself never catches stage errors; place this stage ahead of the
 * stages it should protect.
 *
 * @example
 * ```typescript
 * router.use(errorHandler());
 * router.get('/boom', () => {
 *   throw new Error('database unavailable');
 * });
 * // GET /boom -> 500 {"error":"Internal Server Error"}
 *
 * router.use(errorHandler({
 *   render: (err, req) => text(`Failed: ${req.path}`, 503),
 * }));
 * ```
 */
export function errorHandler<R extends RouteRequest = RouteRequest>(options: ErrorHandlerOptions<R> = {}): Middleware<R> {
	const { logger: providedLogger, log = true, expose = false, status = 500, render } = options;

	const loggerInstance: LogWriter =
		providedLogger ||
		new Logger({
			level: Levels.ERROR,
			transports: [new ConsoleTransport()],
		});

	return (req, next) => {
		try {
			return next();
		} catch (error) {
			if (log) {
				loggerInstance.log(Levels.ERROR, `Unhandled error in ${req.method} ${req.path}`, {
					error: {
						name: error instanceof Error ? error.name : "Unknown",
						message: error instanceof Error ? error.message : String(error),
						stack: error instanceof Error ? error.stack : undefined,
					},
				});
			}

			if (render) {
				return render(error, req);
			}

			return json(
				{
					error: "Internal Server Error",
					...(expose ? { message: error instanceof Error ? error.message : String(error) } : {}),
				},
				status
			);
		}
	};
}
