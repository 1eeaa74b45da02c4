import { randomUUID } from "node:crypto";
import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
import { getHeader } from "@waymark/router";
import type { Middleware, RouteRequest, RouteResponse } from "@waymark/router";

/**
 * Anything that can receive log entries. `Logger` from @rabbit-company/logger satisfies it.
 */
export interface LogWriter {
	log(level: Levels, message: string, metadata?: Record<string, unknown>): void;
}

/**
 * Options for configuring the logger middleware.
 */
export interface LoggerOptions<R extends RouteRequest = RouteRequest> {
	/**
	 * Logger instance to use. If not provided, a console logger will be created.
	 */
	logger?: LogWriter;

	/**
	 * Log level for request and response entries.
	 * Default: Levels.HTTP
	 */
	level?: Levels;

	/**
	 * Preset configuration for common use cases. Explicit options override it.
	 * - "minimal": Just method, path, status, and duration
	 * - "standard": Adds request ID
	 * - "detailed": Adds request headers and client address
	 */
	preset?: "minimal" | "standard" | "detailed";

	/**
	 * Whether to log incoming requests.
	 * Default: true
	 */
	logRequests?: boolean;

	/**
	 * Whether to log responses.
	 * Default: true
	 */
	logResponses?: boolean;

	/**
	 * Whether to include the duration in response entries.
	 * Default: true
	 */
	logDuration?: boolean;

	/**
	 * Whether to assign a request ID, log it and return it in a response header.
	 * Default: true
	 */
	includeRequestId?: boolean;

	/**
	 * Response header carrying the request ID.
	 * Default: "X-Request-Id"
	 */
	requestIdHeader?: string;

	/**
	 * Whether to include request headers in request entries.
	 * Default: false
	 */
	includeHeaders?: boolean;

	/**
	 * Whether to include the client address in request entries.
	 * Default: false
	 */
	includeRemoteAddress?: boolean;

	/**
	 * Headers to leave out of request entries (case-insensitive).
	 * Default: ["authorization", "cookie", "set-cookie"]
	 */
	excludeHeaders?: string[];

	/**
	 * Paths that are not logged (exact match or regex).
	 * Default: ["/health", "/ping"]
	 */
	excludePaths?: (string | RegExp)[];

	/**
	 * Response status codes that are not logged.
	 * Default: []
	 */
	excludeStatusCodes?: number[];

	/**
	 * Function to generate a request ID. Defaults to the incoming `x-request-id` or
	 * `x-correlation-id` header, or a random UUID.
	 */
	generateRequestId?: (req: R) => string;

	/**
	 * Function to determine if a request should be skipped.
	 */
	skip?: (req: R) => boolean;

	/**
	 * Custom message formatter for request entries.
	 */
	formatRequestMessage?: (req: R, requestId: string) => string;

	/**
	 * Custom message formatter for response entries.
	 */
	formatResponseMessage?: (req: R, requestId: string, duration: number, statusCode: number) => string;

	/**
	 * Additional metadata to include in all entries.
	 */
	metadata?: Record<string, unknown> | ((req: R) => Record<string, unknown>);
}

/**
 * Request/response logging middleware using @rabbit-company/logger.
 *
 * Register it first so the duration covers every later stage. Errors thrown further
 * down the chain are logged at `Levels.ERROR` with status 500 and rethrown.
 *
 * @example
 * ```typescript
 * // Minimal logging
 * router.use(logger({ preset: "minimal" }));
 * // Output: GET /api/users 200 4ms
 *
 * // Custom logger and exclusions
 * const appLogger = new Logger({
 *   level: Levels.INFO,
 *   transports: [new ConsoleTransport()],
 * });
 *
 * router.use(logger({
 *   logger: appLogger,
 *   level: Levels.INFO,
 *   excludePaths: ["/health", /^\/static/],
 *   metadata: { service: "api" },
 * }));
 * ```
 */
export function logger<R extends RouteRequest = RouteRequest>(options: LoggerOptions<R> = {}): Middleware<R> {
	const presetConfig = getPresetConfiguration<R>(options.preset);
	const mergedOptions: LoggerOptions<R> = { ...presetConfig, ...options };

	const {
		logger: providedLogger,
		level = Levels.HTTP,
		logRequests = true,
		logResponses = true,
		logDuration = true,
		includeRequestId = true,
		requestIdHeader = "X-Request-Id",
		includeHeaders = false,
		includeRemoteAddress = false,
		excludeHeaders = ["authorization", "cookie", "set-cookie"],
		excludePaths = ["/health", "/ping"],
		excludeStatusCodes = [],
		generateRequestId = defaultRequestIdGenerator,
		skip,
		formatRequestMessage = defaultRequestFormatter,
		formatResponseMessage = defaultResponseFormatter,
		metadata,
	} = mergedOptions;

	const loggerInstance: LogWriter =
		providedLogger ||
		new Logger({
			level,
			transports: [new ConsoleTransport()],
		});

	const normalizedExcludeHeaders = excludeHeaders.map((h) => h.toLowerCase());

	return (req, next) => {
		if (skip && skip(req)) {
			return next();
		}

		const shouldExcludePath = excludePaths.some((path) => {
			if (typeof path === "string") {
				return req.path === path;
			}
			return path.test(req.path);
		});

		if (shouldExcludePath) {
			return next();
		}

		const requestId = includeRequestId ? generateRequestId(req) : "";
		const startTime = Date.now();
		const baseMetadata = getMetadata(metadata, req);

		if (logRequests) {
			const requestMetadata = buildRequestMetadata(req, requestId, baseMetadata, {
				includeHeaders,
				includeRemoteAddress,
				normalizedExcludeHeaders,
			});
			loggerInstance.log(level, formatRequestMessage(req, requestId), requestMetadata);
		}

		let response: RouteResponse;
		try {
			response = next();
		} catch (error) {
			const duration = Date.now() - startTime;

			if (logResponses) {
				const errorMetadata = {
					...baseMetadata,
					...(requestId ? { requestId } : {}),
					...(logDuration ? { duration } : {}),
					statusCode: 500,
					error: {
						name: error instanceof Error ? error.name : "Unknown",
						message: error instanceof Error ? error.message : String(error),
						stack: error instanceof Error ? error.stack : undefined,
					},
				};
				loggerInstance.log(Levels.ERROR, formatResponseMessage(req, requestId, duration, 500), errorMetadata);
			}

			throw error;
		}

		const duration = Date.now() - startTime;

		if (requestId) {
			response.headers[requestIdHeader] = requestId;
		}

		if (logResponses && !excludeStatusCodes.includes(response.status)) {
			const responseMetadata: Record<string, unknown> = {
				...baseMetadata,
				...(requestId ? { requestId } : {}),
				...(logDuration ? { duration } : {}),
				response: { statusCode: response.status },
			};
			loggerInstance.log(level, formatResponseMessage(req, requestId, duration, response.status), responseMetadata);
		}

		return response;
	};
}

/**
 * Get preset configuration for common logging scenarios.
 */
function getPresetConfiguration<R extends RouteRequest>(preset?: LoggerOptions<R>["preset"]): LoggerOptions<R> {
	switch (preset) {
		case "minimal":
			return {
				includeRequestId: false,
				includeHeaders: false,
				includeRemoteAddress: false,
			};

		case "standard":
			return {
				includeRequestId: true,
				includeHeaders: false,
				includeRemoteAddress: false,
			};

		case "detailed":
			return {
				includeRequestId: true,
				includeHeaders: true,
				includeRemoteAddress: true,
			};

		default:
			return {};
	}
}

function defaultRequestIdGenerator(req: RouteRequest): string {
	return getHeader(req, "x-request-id") || getHeader(req, "x-correlation-id") || randomUUID();
}

function defaultRequestFormatter(req: RouteRequest): string {
	return `${req.method} ${req.path}`;
}

function defaultResponseFormatter(req: RouteRequest, requestId: string, duration: number, statusCode: number): string {
	return `${req.method} ${req.path} ${statusCode} ${duration}ms`;
}

/**
 * Build request metadata object.
 */
function buildRequestMetadata(
	req: RouteRequest,
	requestId: string,
	baseMetadata: Record<string, unknown>,
	options: {
		includeHeaders: boolean;
		includeRemoteAddress: boolean;
		normalizedExcludeHeaders: string[];
	}
): Record<string, unknown> {
	const metadata: Record<string, unknown> = {
		...baseMetadata,
		...(requestId ? { requestId } : {}),
	};

	if (options.includeHeaders || options.includeRemoteAddress) {
		const requestData: Record<string, unknown> = {
			method: req.method,
			path: req.path,
		};

		if (options.includeHeaders) {
			const headers: Record<string, string> = {};
			for (const [key, value] of Object.entries(req.headers ?? {})) {
				if (!options.normalizedExcludeHeaders.includes(key.toLowerCase())) {
					headers[key] = value;
				}
			}
			requestData.headers = headers;
		}

		if (options.includeRemoteAddress) {
			requestData.remoteAddress = req.clientIp;
		}

		metadata.request = requestData;
	}

	return metadata;
}

function getMetadata<R extends RouteRequest>(metadata: LoggerOptions<R>["metadata"], req: R): Record<string, unknown> {
	if (!metadata) return {};
	if (typeof metadata === "function") return metadata(req);
	return metadata;
}

export { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
