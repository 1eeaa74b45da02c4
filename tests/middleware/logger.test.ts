import { beforeEach, describe, expect, it, vi } from "vitest";
import { Levels, logger } from "../../packages/middleware/src/logger";
import type { LogWriter } from "../../packages/middleware/src/logger";
import { runChain, text } from "../../packages/core/src";
import type { Middleware, RouteRequest, RouteResponse } from "../../packages/core/src";

class MockLogger implements LogWriter {
	public logs: Array<{ level: Levels; message: string; metadata: Record<string, unknown> }> = [];

	log(level: Levels, message: string, metadata: Record<string, unknown> = {}): void {
		this.logs.push({ level, message, metadata });
	}
}

function mockRequest(path = "/api/test", method = "GET", headers: Record<string, string> = {}): RouteRequest {
	return { method, path, params: {}, headers };
}

function run(middleware: Middleware, req: RouteRequest, handler: Middleware = () => text("OK")): RouteResponse {
	return runChain([middleware, handler], req);
}

describe("Logger Middleware", () => {
	let mockLogger: MockLogger;

	beforeEach(() => {
		mockLogger = new MockLogger();
	});

	describe("Basic Functionality", () => {
		it("should log request and response", () => {
			const middleware = logger({ logger: mockLogger, preset: "standard" });

			run(middleware, mockRequest());

			expect(mockLogger.logs).toHaveLength(2);

			const [requestLog, responseLog] = mockLogger.logs;
			expect(requestLog.level).toBe(Levels.HTTP);
			expect(requestLog.message).toBe("GET /api/test");
			expect(typeof requestLog.metadata.requestId).toBe("string");

			expect(responseLog.level).toBe(Levels.HTTP);
			expect(responseLog.message).toMatch(/^GET \/api\/test 200 \d+ms$/);
			expect(responseLog.metadata.response).toEqual({ statusCode: 200 });
			expect(responseLog.metadata.duration).toBeGreaterThanOrEqual(0);
		});

		it("should return the downstream response", () => {
			const middleware = logger({ logger: mockLogger, includeRequestId: false });

			const res = run(middleware, mockRequest(), () => text("created", 201));

			expect(res).toEqual({ status: 201, headers: { "Content-Type": "text/plain" }, body: "created" });
		});

		it("should log at the configured level", () => {
			const middleware = logger({ logger: mockLogger, level: Levels.INFO });

			run(middleware, mockRequest());

			expect(mockLogger.logs.map((entry) => entry.level)).toEqual([Levels.INFO, Levels.INFO]);
		});
	});

	describe("Request ID", () => {
		it("should reuse the incoming x-request-id header and echo it", () => {
			const middleware = logger({ logger: mockLogger });

			const res = run(middleware, mockRequest("/api/test", "GET", { "X-Request-Id": "test-request-id" }));

			expect(mockLogger.logs[0].metadata.requestId).toBe("test-request-id");
			expect(res.headers["X-Request-Id"]).toBe("test-request-id");
		});

		it("should fall back to x-correlation-id", () => {
			const middleware = logger({ logger: mockLogger });

			run(middleware, mockRequest("/api/test", "GET", { "x-correlation-id": "corr-1" }));

			expect(mockLogger.logs[1].metadata.requestId).toBe("corr-1");
		});

		it("should generate an ID when the request has none", () => {
			const middleware = logger({ logger: mockLogger });

			const res = run(middleware, mockRequest());

			expect(res.headers["X-Request-Id"]).toMatch(/^[0-9a-f-]{36}$/);
			expect(mockLogger.logs[0].metadata.requestId).toBe(res.headers["X-Request-Id"]);
		});

		it("should use a custom generator and header", () => {
			const middleware = logger({
				logger: mockLogger,
				generateRequestId: (req) => `req-${req.path}`,
				requestIdHeader: "X-Trace",
			});

			const res = run(middleware, mockRequest("/a"));

			expect(res.headers["X-Trace"]).toBe("req-/a");
		});

		it("should omit the ID with the minimal preset", () => {
			const middleware = logger({ logger: mockLogger, preset: "minimal" });

			const res = run(middleware, mockRequest());

			expect(res.headers["X-Request-Id"]).toBeUndefined();
			expect(mockLogger.logs[0].metadata).toEqual({});
		});
	});

	describe("Request Logging", () => {
		it("should log request headers excluding sensitive ones", () => {
			const middleware = logger({
				logger: mockLogger,
				includeHeaders: true,
				includeRequestId: false,
			});

			run(
				middleware,
				mockRequest("/api/test", "POST", {
					Authorization: "Bearer test-token",
					"content-type": "application/json",
					cookie: "session=test",
				})
			);

			expect(mockLogger.logs[0].metadata.request).toEqual({
				method: "POST",
				path: "/api/test",
				headers: { "content-type": "application/json" },
			});
		});

		it("should include the client address with the detailed preset", () => {
			const middleware = logger({ logger: mockLogger, preset: "detailed" });
			const req = mockRequest();
			req.clientIp = "192.0.2.10";

			run(middleware, req);

			expect(mockLogger.logs[0].metadata.request).toHaveProperty("remoteAddress", "192.0.2.10");
		});

		it("should skip request entries when logRequests is false", () => {
			const middleware = logger({ logger: mockLogger, logRequests: false });

			run(middleware, mockRequest());

			expect(mockLogger.logs).toHaveLength(1);
			expect(mockLogger.logs[0].metadata.response).toEqual({ statusCode: 200 });
		});

		it("should use custom formatters", () => {
			const middleware = logger({
				logger: mockLogger,
				formatRequestMessage: (req) => `--> ${req.path}`,
				formatResponseMessage: (req, id, duration, status) => `<-- ${req.path} ${status}`,
			});

			run(middleware, mockRequest("/x"), () => text("gone", 410));

			expect(mockLogger.logs.map((entry) => entry.message)).toEqual(["--> /x", "<-- /x 410"]);
		});

		it("should merge static and computed metadata", () => {
			const staticLogger = logger({ logger: mockLogger, includeRequestId: false, metadata: { service: "api" } });
			run(staticLogger, mockRequest());
			expect(mockLogger.logs[0].metadata).toEqual({ service: "api" });

			mockLogger.logs = [];
			const computedLogger = logger({ logger: mockLogger, includeRequestId: false, metadata: (req) => ({ route: req.path }) });
			run(computedLogger, mockRequest("/computed"));
			expect(mockLogger.logs[0].metadata).toEqual({ route: "/computed" });
		});
	});

	describe("Exclusions", () => {
		it("should not log default excluded paths", () => {
			const middleware = logger({ logger: mockLogger });

			const res = run(middleware, mockRequest("/health"));

			expect(res.body).toBe("OK");
			expect(mockLogger.logs).toHaveLength(0);
		});

		it("should exclude paths by regex", () => {
			const middleware = logger({ logger: mockLogger, excludePaths: [/^\/static\//] });

			run(middleware, mockRequest("/static/app.js"));
			run(middleware, mockRequest("/health"));

			expect(mockLogger.logs.map((entry) => entry.message)).toEqual(["GET /health", expect.stringMatching(/^GET \/health 200/)]);
		});

		it("should skip response entries for excluded status codes", () => {
			const middleware = logger({ logger: mockLogger, excludeStatusCodes: [404] });

			run(middleware, mockRequest(), () => text("Not Found", 404));

			expect(mockLogger.logs).toHaveLength(1);
			expect(mockLogger.logs[0].message).toBe("GET /api/test");
		});

		it("should honor the skip option", () => {
			const skip = vi.fn((req: RouteRequest) => req.method === "OPTIONS");
			const middleware = logger({ logger: mockLogger, skip });

			run(middleware, mockRequest("/api/test", "OPTIONS"));

			expect(skip).toHaveBeenCalledTimes(1);
			expect(mockLogger.logs).toHaveLength(0);
		});
	});

	describe("Errors", () => {
		it("should log thrown errors at error level and rethrow", () => {
			const middleware = logger({ logger: mockLogger, includeRequestId: false });
			const failing: Middleware = () => {
				throw new TypeError("bad input");
			};

			expect(() => run(middleware, mockRequest(), failing)).toThrow("bad input");

			expect(mockLogger.logs).toHaveLength(2);
			const errorLog = mockLogger.logs[1];
			expect(errorLog.level).toBe(Levels.ERROR);
			expect(errorLog.message).toMatch(/^GET \/api\/test 500 \d+ms$/);
			expect(errorLog.metadata.statusCode).toBe(500);
			expect(errorLog.metadata.error).toMatchObject({ name: "TypeError", message: "bad input" });
		});

		it("should describe non-Error throws", () => {
			const middleware = logger({ logger: mockLogger, includeRequestId: false });

			expect(() =>
				run(middleware, mockRequest(), () => {
					throw "plain failure";
				})
			).toThrow();

			expect(mockLogger.logs[1].metadata.error).toEqual({ name: "Unknown", message: "plain failure", stack: undefined });
		});
	});
});
