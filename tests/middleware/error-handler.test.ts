import { beforeEach, describe, expect, it } from "vitest";
import { errorHandler } from "../../packages/middleware/src/error-handler";
import { Levels } from "../../packages/middleware/src/logger";
import type { LogWriter } from "../../packages/middleware/src/logger";
import { Router, text } from "../../packages/core/src";
import type { RouteRequest } from "../../packages/core/src";

class MockLogger implements LogWriter {
	public logs: Array<{ level: Levels; message: string; metadata: Record<string, unknown> }> = [];

	log(level: Levels, message: string, metadata: Record<string, unknown> = {}): void {
		this.logs.push({ level, message, metadata });
	}
}

function mockRequest(path: string, method = "GET"): RouteRequest {
	return { method, path, params: {} };
}

describe("Error Handler Middleware", () => {
	let mockLogger: MockLogger;
	let router: Router;

	beforeEach(() => {
		mockLogger = new MockLogger();
		router = new Router();
		router.get("/ok", () => text("fine"));
		router.get("/boom", () => {
			throw new Error("database unavailable");
		});
	});

	it("should pass successful responses through unchanged", () => {
		router.use(errorHandler({ logger: mockLogger }));

		const res = router.dispatch(mockRequest("/ok"));

		expect(res).toEqual({ status: 200, headers: { "Content-Type": "text/plain" }, body: "fine" });
		expect(mockLogger.logs).toHaveLength(0);
	});

	it("should convert thrown errors into a 500 JSON response", () => {
		router.use(errorHandler({ logger: mockLogger }));

		const res = router.dispatch(mockRequest("/boom"));

		expect(res.status).toBe(500);
		expect(res.headers["Content-Type"]).toBe("application/json");
		expect(res.body).toBe('{"error":"Internal Server Error"}');
	});

	it("should log caught errors at error level", () => {
		router.use(errorHandler({ logger: mockLogger }));

		router.dispatch(mockRequest("/boom"));

		expect(mockLogger.logs).toHaveLength(1);
		expect(mockLogger.logs[0].level).toBe(Levels.ERROR);
		expect(mockLogger.logs[0].message).toBe("Unhandled error in GET /boom");
		expect(mockLogger.logs[0].metadata.error).toMatchObject({ name: "Error", message: "database unavailable" });
	});

	it("should not log when logging is disabled", () => {
		router.use(errorHandler({ logger: mockLogger, log: false }));

		router.dispatch(mockRequest("/boom"));

		expect(mockLogger.logs).toHaveLength(0);
	});

	it("should expose the message and use a custom status when configured", () => {
		router.use(errorHandler({ logger: mockLogger, expose: true, status: 503 }));

		const res = router.dispatch(mockRequest("/boom"));

		expect(res.status).toBe(503);
		expect(res.body).toBe('{"error":"Internal Server Error","message":"database unavailable"}');
	});

	it("should use a custom renderer", () => {
		router.use(
			errorHandler({
				logger: mockLogger,
				render: (error, req) => text(`Failed: ${req.path} (${error instanceof Error ? error.message : "unknown"})`, 502),
			})
		);

		const res = router.dispatch(mockRequest("/boom"));

		expect(res.status).toBe(502);
		expect(res.body).toBe("Failed: /boom (database unavailable)");
	});

	it("should only protect stages that run after it", () => {
		router.use(() => {
			throw new Error("before the boundary");
		});
		router.use(errorHandler({ logger: mockLogger }));

		expect(() => router.dispatch(mockRequest("/ok"))).toThrow("before the boundary");
	});

	it("should work as group-local middleware", () => {
		const scoped = new Router();
		scoped.group("/api", (api) => {
			api.use(errorHandler({ logger: mockLogger }));
			api.get("/fail", () => {
				throw new Error("api failure");
			});
		});
		scoped.get("/fail", () => {
			throw new Error("unprotected");
		});

		expect(scoped.dispatch(mockRequest("/api/fail")).status).toBe(500);
		expect(() => scoped.dispatch(mockRequest("/fail"))).toThrow("unprotected");
	});
});
