import { STATUS_CODES } from "node:http";

/**
 * Base class for every error raised by the framework.
 */
export class WebError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * A failure a handler wants turned into a response carrying `status` and `message`.
 *
 * @example
 * ```typescript
 * router.post("/login", async (app, req, res) => {
 *   const form = req.form();
 *   if (!form.username) throw new HttpError(400, "missing user name");
 *   await res.send("welcome");
 * });
 * ```
 */
export class HttpError extends WebError {
	constructor(
		public readonly status: number,
		message: string = STATUS_CODES[status] ?? "Error",
		options?: ErrorOptions
	) {
		super(message, options);
	}
}

/** Malformed or unexpected form body. */
export class FormParseError extends HttpError {
	constructor(message: string) {
		super(400, message);
	}
}

export class PayloadTooLargeError extends HttpError {
	constructor(public readonly limit: number) {
		super(413, "Payload Too Large");
	}
}

/** The application instance for a request could not be constructed or cloned. */
export class InstanceCreationError extends WebError {}

/** A template is missing or failed while rendering. */
export class RenderError extends WebError {}

/** The file-read collaborator found nothing at the requested path. */
export class FileNotFoundError extends WebError {
	constructor(public readonly path: string, options?: ErrorOptions) {
		super(`File not found: ${path}`, options);
	}
}

/** A response operation was attempted in a state that does not allow it. */
export class ResponseStateError extends WebError {}

export class RequestSealedError extends WebError {
	constructor() {
		super("Request state can only be changed by the middleware hook");
	}
}

export class RouterFrozenError extends WebError {
	constructor() {
		super("Routes cannot be registered once the server has started");
	}
}

export class PoolClosedError extends HttpError {
	constructor() {
		super(503, "Service Unavailable");
	}
}
