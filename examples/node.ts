import { createServer } from "node:http";
import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from "node:http";
import { json, Router, text } from "@waymark/router";
import type { Controller, RouteRequest, RouteResponse } from "@waymark/router";
import { bearerAuth, ConsoleTransport, cors, errorHandler, Levels, Logger, logger, rateLimit } from "@waymark/middleware";

/**
 * Serving a router from node:http
 *
 * The router never touches the network: this file turns each IncomingMessage into a
 * RouteRequest, dispatches it, and writes the RouteResponse back. It covers:
 * - Global middleware (logging, error handling, CORS)
 * - Route parameters and wildcards
 * - A group with its own authentication and rate limit
 * - Resource routes from a controller
 */

const appLogger = new Logger({
	level: Levels.HTTP,
	transports: [new ConsoleTransport()],
});

interface Note {
	id: string;
	text: string;
}

const notes = new Map<string, Note>([["1", { id: "1", text: "first note" }]]);

const router = new Router();

router.use(logger({ logger: appLogger, preset: "standard" }));
router.use(errorHandler({ logger: appLogger }));
router.use(
	cors({
		origin: ["http://localhost:8080"],
		allowMethods: ["GET", "POST", "PUT", "DELETE"],
	})
);

router.get("/", () => text("waymark is running"));
router.get("/health", () => json({ status: "ok" }));

router.get("/hello/:name", (req) => text(`Hello, ${req.params.name}!`));
router.get("/files/*path", (req) => json({ path: req.params.path }));

const noteController: Controller = {
	index: () => json([...notes.values()]),
	show: (req) => {
		const note = notes.get(req.params.id);
		return note ? json(note) : json({ error: "Note not found" }, 404);
	},
	destroy: (req) => {
		notes.delete(req.params.id);
		return text("", 204);
	},
};

router.group("/admin", (admin) => {
	admin.use(rateLimit({ max: 10, windowMs: 60 * 1000 }));
	admin.use(bearerAuth({ validate: (token) => (token === "test-admin-token" ? { role: "admin" } : false), realm: "admin" }));

	admin.get("/whoami", (req) => json(req.state?.user ?? null));
	admin.resources("notes", noteController);
});

function toHeaders(raw: IncomingHttpHeaders): Record<string, string> {
	const headers: Record<string, string> = {};
	for (const [name, value] of Object.entries(raw)) {
		if (value === undefined) continue;
		headers[name] = Array.isArray(value) ? value.join(", ") : value;
	}
	return headers;
}

function toRouteRequest(req: IncomingMessage): RouteRequest {
	const url = new URL(req.url ?? "/", "http://localhost");
	return {
		method: req.method ?? "GET",
		path: url.pathname,
		params: {},
		headers: toHeaders(req.headers),
		clientIp: req.socket.remoteAddress,
	};
}

function send(res: ServerResponse, response: RouteResponse): void {
	res.writeHead(response.status, response.headers);
	res.end(response.body);
}

const handle = router.handler();
const port = Number(process.env.PORT ?? 3000);

createServer((req, res) => {
	try {
		send(res, handle(toRouteRequest(req)));
	} catch (error) {
		appLogger.log(Levels.ERROR, "Request failed outside the error boundary", { error: error instanceof Error ? error.message : String(error) });
		send(res, text("Internal Server Error", 500));
	}
}).listen(port, () => {
	appLogger.log(Levels.INFO, `Server running on http://localhost:${port}`);
});
