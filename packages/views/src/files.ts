import { isAbsolute, join, normalize, relative } from "node:path";
import { WILDCARD_PARAM } from "@threadline/web";
import type { RequestState, StaticCallback } from "@threadline/web";

/**
 * Resolves a request path inside `root`, or `null` when it would leave it.
 *
 * @example
 * ```typescript
 * resolveSafePath("web", "css/site.css"); // "web/css/site.css"
 * resolveSafePath("web", "../secret.txt"); // "web/secret.txt"
 * ```
 */
export function resolveSafePath(root: string, requestPath: string): string | null {
	// Strip leading parent references before joining
	const normalizedPath = normalize(requestPath).replace(/^(\.\.[/\\])+/, "");
	const fullPath = join(root, normalizedPath);

	// Ensure path is within root
	const rel = relative(root, fullPath);
	if (rel.startsWith("..") || isAbsolute(rel)) {
		return null;
	}

	return fullPath;
}

function hasDotfile(requestPath: string): boolean {
	return requestPath.split(/[/\\]/).some((part) => part.startsWith(".") && part !== "." && part !== "..");
}

/**
 * Static callback serving files below `root` for a mount registered with
 * `registerStaticMount`. Paths leaving `root` and dotfiles answer 404.
 *
 * @example
 * ```typescript
 * app.registerStaticMount('/static', serveFiles('web'));
 * // GET /static/css/site.css -> web/css/site.css
 * ```
 */
export function serveFiles<S extends RequestState = RequestState>(root: string): StaticCallback<S> {
	return (req, res) => {
		const requestPath = req.params[WILDCARD_PARAM] ?? "";
		const path = hasDotfile(requestPath) ? null : resolveSafePath(root, requestPath);

		if (!path) {
			return res.status(404).contentType("text/plain; charset=utf-8").send("Not Found");
		}
		return res.sendFile(path);
	};
}
