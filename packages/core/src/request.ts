import { parse as parseCookies } from "cookie";
import { FormParseError, RequestSealedError } from "./errors";
import { getPathSegments } from "./router";
import type { RequestState } from "./types";

/** Empty URLSearchParams instance used as default query params */
const EMPTY_SEARCH_PARAMS = new URLSearchParams();

const decoder = new TextDecoder();

export interface Cookie {
	name: string;
	value: string;
}

/**
 * Parts of an incoming request the server hands to `HttpRequest`.
 */
export interface HttpRequestInit {
	method: string;
	url: URL;
	headers: Headers;
	body?: Uint8Array;
	params?: Readonly<Record<string, string>>;
	clientIp?: string;
}

/**
 * The request as seen by middleware and route callbacks.
 *
 * Everything is read-only except the state bag, which the middleware hook may fill
 * through `set`. The server seals the request before the route callback runs.
 *
 * @template S - The type of the state the middleware hook attaches
 *
 * @example
 * ```typescript
 * router.get('/hello/:first_name/:last_name', (app, req, res) => {
 *   const first = req.param('first_name') ?? 'John';
 *   const page = req.query.get('page');
 *   const theme = req.cookie('theme');
 *   return res.send(`Hello ${first}`);
 * });
 * ```
 */
export class HttpRequest<S extends RequestState = RequestState> {
	readonly method: string;
	readonly url: URL;
	readonly pathname: string;
	/** Path split into its non-empty segments */
	readonly path: readonly string[];
	/** Route parameters in pattern order; a wildcard mount binds "*" */
	readonly params: Readonly<Record<string, string>>;
	readonly headers: Headers;
	readonly query: URLSearchParams;
	/** Client IP address, when the transport knows it */
	readonly clientIp?: string;

	private readonly body: Uint8Array;
	private readonly state: Partial<S> = {};
	private sealed = false;
	private cookieCache?: Cookie[];

	constructor(init: HttpRequestInit) {
		this.method = init.method;
		this.url = init.url;
		this.pathname = init.url.pathname;
		this.path = getPathSegments(init.url.pathname);
		this.params = init.params ?? {};
		this.headers = init.headers;
		this.query = init.url.search ? init.url.searchParams : EMPTY_SEARCH_PARAMS;
		this.clientIp = init.clientIp;
		this.body = init.body ?? new Uint8Array(0);
	}

	/** Value of a route parameter. */
	param(name: string): string | undefined {
		return this.params[name];
	}

	/** Value of a request header (case-insensitive). */
	header(name: string): string | undefined {
		return this.headers.get(name) ?? undefined;
	}

	/** Raw body bytes. */
	bytes(): Uint8Array {
		return this.body;
	}

	/** Body decoded as UTF-8. */
	text(): string {
		return decoder.decode(this.body);
	}

	/**
	 * Body parsed as JSON.
	 *
	 * @throws {FormParseError} when the body is not valid JSON
	 */
	json(): unknown {
		try {
			return JSON.parse(this.text());
		} catch {
			throw new FormParseError("Request body is not valid JSON");
		}
	}

	/**
	 * Cookies sent with the request, in header order.
	 *
	 * @example
	 * ```typescript
	 * const name = req.cookies().find((cookie) => cookie.name === 'name')?.value ?? 'nope';
	 * ```
	 */
	cookies(): Cookie[] {
		if (this.cookieCache) return this.cookieCache;

		const header = this.headers.get("cookie");
		const cookies: Cookie[] = [];
		if (header) {
			for (const [name, value] of Object.entries(parseCookies(header))) {
				if (value !== undefined) cookies.push({ name, value });
			}
		}

		this.cookieCache = cookies;
		return cookies;
	}

	/** Value of one cookie. */
	cookie(name: string): string | undefined {
		return this.cookies().find((cookie) => cookie.name === name)?.value;
	}

	/**
	 * Parses an `application/x-www-form-urlencoded` body. Repeated fields keep the last value.
	 *
	 * @throws {FormParseError} when the content type is different or a field is not valid percent-encoding
	 *
	 * @example
	 * ```typescript
	 * const form = req.form();
	 * const username = form.username;
	 * ```
	 */
	form(): Record<string, string> {
		const type = this.headers.get("content-type") ?? "";
		if (!type.toLowerCase().includes("application/x-www-form-urlencoded")) {
			throw new FormParseError("Expected an application/x-www-form-urlencoded body");
		}

		const entries: Array<[string, string]> = [];
		for (const pair of this.text().split("&")) {
			if (!pair) continue;

			const separator = pair.indexOf("=");
			const rawName = separator === -1 ? pair : pair.slice(0, separator);
			const rawValue = separator === -1 ? "" : pair.slice(separator + 1);

			try {
				entries.push([decodeFormComponent(rawName), decodeFormComponent(rawValue)]);
			} catch {
				throw new FormParseError(`Malformed form field "${pair}"`);
			}
		}

		return Object.fromEntries(entries);
	}

	/**
	 * Sets a value in the request state. Only allowed while the middleware hook runs.
	 *
	 * @throws {RequestSealedError} once the route callback has started
	 */
	set<K extends keyof S>(key: K, value: S[K]): void {
		if (this.sealed) throw new RequestSealedError();
		this.state[key] = value;
	}

	/** Gets a value from the request state. */
	get<K extends keyof S>(key: K): S[K] | undefined {
		return this.state[key];
	}

	/** Whether the state bag has been closed to writes. */
	get isSealed(): boolean {
		return this.sealed;
	}

	/**
	 * Closes the state bag to writes.
	 * @internal
	 */
	seal(): void {
		this.sealed = true;
	}
}

function decodeFormComponent(value: string): string {
	return decodeURIComponent(value.replace(/\+/g, " "));
}
