import type { RouteRequest, RouteResponse } from "./types";

/** Body of the response returned when no route matches */
export const NOT_FOUND_BODY = "Not Found";

/**
 * Builds the response returned by `dispatch` when no route matches.
 * A new object is returned on every call so stages may modify it freely.
 */
export function notFound(): RouteResponse {
	return { status: 404, headers: { "Content-Type": "text/plain" }, body: NOT_FOUND_BODY };
}

/**
 * Builds the response returned when a chain runs past its last stage.
 */
export function emptyResponse(): RouteResponse {
	return { status: 200, headers: { "Content-Type": "text/plain" }, body: "" };
}

/**
 * Returns a plain text response.
 *
 * @param body - Text content for the response body
 * @param status - HTTP status code (default: 200)
 * @param headers - Additional headers to include
 *
 * @example
 * ```typescript
 * return text('Hello World');
 * return text('Created', 201, { 'X-Custom': 'value' });
 * ```
 */
export function text(body: string | null | undefined, status = 200, headers?: Record<string, string>): RouteResponse {
	return { status, headers: { "Content-Type": "text/plain", ...headers }, body: body ?? "" };
}

/**
 * Returns a JSON response.
 *
 * @param data - Data to be serialized as JSON
 * @param status - HTTP status code (default: 200)
 * @param headers - Additional headers to include
 *
 * @example
 * ```typescript
 * return json({ message: 'Success' });
 * return json({ error: 'Not found' }, 404);
 * ```
 */
export function json(data: unknown, status = 200, headers?: Record<string, string>): RouteResponse {
	return { status, headers: { "Content-Type": "application/json", ...headers }, body: JSON.stringify(data) };
}

/**
 * Returns an HTML response.
 *
 * @param markup - HTML content for the response body
 * @param status - HTTP status code (default: 200)
 * @param headers - Additional headers to include
 */
export function html(markup: string | null | undefined, status = 200, headers?: Record<string, string>): RouteResponse {
	return { status, headers: { "Content-Type": "text/html; charset=utf-8", ...headers }, body: markup ?? "" };
}

/**
 * Returns a redirect response.
 *
 * @param url - URL to redirect to
 * @param status - HTTP status code for redirect (default: 302)
 *
 * @example
 * ```typescript
 * return redirect('/login');
 * return redirect('https://example.com', 301);
 * ```
 */
export function redirect(url: string, status = 302): RouteResponse {
	return { status, headers: { Location: url }, body: "" };
}

/**
 * Looks up a request header by name, ignoring case.
 *
 * @returns The header value, or undefined when the transport supplied none
 */
export function getHeader(req: RouteRequest, name: string): string | undefined {
	const headers = req.headers;
	if (!headers) return undefined;
	if (Object.hasOwn(headers, name)) return headers[name];

	const wanted = name.toLowerCase();
	for (const key of Object.keys(headers)) {
		if (key.toLowerCase() === wanted) return headers[key];
	}
	return undefined;
}
