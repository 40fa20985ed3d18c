import { InstanceCreationError } from "./errors";
import type { HttpRequest } from "./request";
import type { ResponseWriter } from "./response";
import type { HandlerDescriptor, InstanceCallback, InstanceFactory, MiddlewareHook, RequestState, StaticCallback } from "./types";

/**
 * Wraps a callback bound to the application type.
 */
export function instanceHandler<A, S extends RequestState = RequestState>(callback: InstanceCallback<A, S>): HandlerDescriptor<A, S> {
	return { kind: "instance", callback };
}

/**
 * Wraps a callback that runs without an application instance.
 */
export function staticHandler<A, S extends RequestState = RequestState>(callback: StaticCallback<S>): HandlerDescriptor<A, S> {
	return { kind: "static", callback };
}

/** Middleware used when the application registers none. */
export function noopMiddleware(): void {}

/**
 * Runs a matched handler. Instance callbacks get a fresh application instance from
 * `factory` and pass through the middleware hook first; static callbacks run directly.
 * The request is sealed before the route callback sees it.
 *
 * @throws {InstanceCreationError} when no factory is configured or it fails
 */
export async function invokeHandler<A, S extends RequestState>(
	descriptor: HandlerDescriptor<A, S>,
	factory: InstanceFactory<A> | undefined,
	before: MiddlewareHook<A, S>,
	req: HttpRequest<S>,
	res: ResponseWriter
): Promise<void> {
	if (descriptor.kind === "static") {
		req.seal();
		await descriptor.callback(req, res);
		return;
	}

	if (!factory) {
		throw new InstanceCreationError("No application factory configured; start the server with start() or startWith()");
	}

	const app = factory.create();
	await before(app, req);
	req.seal();
	await descriptor.callback(app, req, res);
}
