import { RouteDefinitionError } from "./errors";
import type { CompiledPattern, Params } from "./types";

/** Capture for a `:name` parameter: one non-empty segment */
const SEGMENT_CAPTURE = "([^/]+)";

/** Capture for a `*name` parameter: the rest of the path, possibly empty */
const REST_CAPTURE = "([\\s\\S]*)";

/** Name given to a `*` wildcard written without a name */
export const DEFAULT_WILDCARD_NAME = "splat";

/** Characters that would act as operators inside a RegExp source */
const REGEX_SPECIAL = /[.\-*+?^${}()|[\]\\/]/g;

/**
 * Tests whether a character may appear in a parameter name.
 * @private
 */
function isNameChar(char: string | undefined): boolean {
	if (char === undefined) return false;
	return (char >= "a" && char <= "z") || (char >= "A" && char <= "Z") || (char >= "0" && char <= "9") || char === "_";
}

/**
 * Reads a parameter name starting at `start`.
 * @private
 */
function readName(template: string, start: number): string {
	let end = start;
	while (isNameChar(template[end])) end++;
	return template.slice(start, end);
}

/**
 * Compiles a path template into an anchored matcher.
 *
 * Supported tokens:
 * - literal text, which only ever matches itself
 * - `:name` captures a single non-empty segment (no `/`)
 * - `*name` captures the remainder of the path, `/` included, and may be empty;
 *   a bare `*` is named `splat`
 *
 * The whole path must match. Trailing slashes are significant.
 *
 * @param template - Path template such as `/users/:id` or `/files/*path`
 * @returns The compiled pattern
 * @throws {RouteDefinitionError} When the template is not a string
 *
 * @example
 * ```typescript
 * const pattern = compilePattern('/users/:id/files/*path');
 * pattern.paramNames; // ["id", "path"]
 * pattern.match('/users/7/files/a/b.txt'); // { id: "7", path: "a/b.txt" }
 * pattern.match('/users//files/x'); // null
 * ```
 */
export function compilePattern(template: string): CompiledPattern {
	if (typeof template !== "string") {
		throw new RouteDefinitionError("Route path must be a string", "INVALID_PATH");
	}

	const paramNames: string[] = [];
	let source = "";
	let literal = "";
	let i = 0;

	const flushLiteral = () => {
		source += literal.replace(REGEX_SPECIAL, "\\$&");
		literal = "";
	};

	while (i < template.length) {
		const char = template[i];

		if (char === ":") {
			const name = readName(template, i + 1);
			if (name) {
				flushLiteral();
				paramNames.push(name);
				source += SEGMENT_CAPTURE;
				i += name.length + 1;
				continue;
			}
		} else if (char === "*") {
			const name = readName(template, i + 1);
			flushLiteral();
			paramNames.push(name || DEFAULT_WILDCARD_NAME);
			source += REST_CAPTURE;
			i += name.length + 1;
			continue;
		}

		literal += char;
		i++;
	}
	flushLiteral();

	const regex = new RegExp(`^${source}$`);
	const names = Object.freeze(paramNames);

	return Object.freeze({
		template,
		regex,
		paramNames: names,
		match(path: string): Params | null {
			const result = regex.exec(path);
			if (!result) return null;

			const params: Params = {};
			for (let n = 0; n < names.length; n++) {
				params[names[n]] = result[n + 1] ?? "";
			}
			return params;
		},
	});
}
