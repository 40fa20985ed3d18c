import { Levels } from "@rabbit-company/logger";
import { afterEach, describe, expect, it, vi } from "vitest";
import { currentListenerId, freshInstances, LISTENER_ENV, toOutgoingHeaders, Web } from "../packages/core/src";
import type { Server, WebOptions } from "../packages/core/src";
import { MemoryLogger, sleep } from "./helpers";

const decoder = new TextDecoder();

class MyApp {
	hits = 0;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

describe("Node.js server", () => {
	let server: Server | undefined;

	afterEach(async () => {
		await server?.stop();
		server = undefined;
	});

	async function serve(app: Web<MyApp>): Promise<string> {
		server = await app.listen({ port: 0, hostname: "127.0.0.1", listeners: 1 });
		return `http://127.0.0.1:${server.port}`;
	}

	function createApp(options: WebOptions = {}): { app: Web<MyApp>; logger: MemoryLogger } {
		const logger = new MemoryLogger();
		const app = new Web<MyApp>({ logger, accessLog: false, ...options });
		app.useInstances(freshInstances(() => new MyApp()));
		return { app, logger };
	}

	it("should bind an ephemeral port and answer requests", async () => {
		const { app, logger } = createApp();
		app.get("/hello/:name", (app, req, res) => res.send(`Hello ${req.param("name")}`));

		const base = await serve(app);
		const res = await fetch(`${base}/hello/Jane`);

		expect(server?.role).toBe("listener");
		expect(res.status).toBe(200);
		expect(await res.text()).toBe("Hello Jane");
		expect(logger.messages(Levels.INFO)).toContain(`Listener 1 listening on ${base}`);
	});

	it("should deliver streamed chunks as they are appended", async () => {
		const first = deferred();
		const second = deferred();
		const { app } = createApp();
		app.get("/streaming", async (app, req, res) => {
			const stream = res.stream();
			await stream.append("toto");
			await first.promise;
			await stream.append("tata");
			await second.promise;
			await stream.append("titi");
		});

		const base = await serve(app);
		const res = await fetch(`${base}/streaming`);
		const reader = res.body?.getReader();
		if (!reader) throw new Error("Expected a response body");

		const next = async (): Promise<string | null> => {
			const { done, value } = await reader.read();
			return done ? null : decoder.decode(value);
		};

		expect(await next()).toBe("toto");
		first.resolve();
		expect(await next()).toBe("tata");
		second.resolve();
		expect(await next()).toBe("titi");
		expect(await next()).toBeNull();
	});

	it("should reject an oversized body with 413", async () => {
		const { app } = createApp({ maxBodySize: 8 });
		app.post("/upload", (app, req, res) => res.send(String(req.bytes().length)));

		const base = await serve(app);

		const tooLarge = await fetch(`${base}/upload`, { method: "POST", body: "0123456789abcdef" });
		expect(tooLarge.status).toBe(413);
		expect(await tooLarge.text()).toBe("Payload Too Large");

		const small = await fetch(`${base}/upload`, { method: "POST", body: "0123" });
		expect(await small.text()).toBe("4");
	});

	it("should keep repeated headers", async () => {
		const { app } = createApp();
		app.get("/login", (app, req, res) => res.cookie("name", "Jane").cookie("theme", "dark").send());

		const base = await serve(app);
		const res = await fetch(`${base}/login`);

		expect(res.headers.getSetCookie()).toEqual(["name=Jane", "theme=dark"]);
	});

	it("should stop appending once the client disconnects and free the slot", async () => {
		let appended = 0;
		let finished = false;
		const { app } = createApp({ workers: 1 });
		app.get("/ticks", async (app, req, res) => {
			const stream = res.stream();
			while (await stream.append("tick")) {
				appended++;
				await sleep(10);
			}
			finished = true;
		});

		const base = await serve(app);
		const controller = new AbortController();
		const res = await fetch(`${base}/ticks`, { signal: controller.signal });
		const reader = res.body?.getReader();
		if (!reader) throw new Error("Expected a response body");

		await reader.read();
		controller.abort();

		await vi.waitFor(() => expect(finished).toBe(true), { timeout: 2000 });
		await vi.waitFor(() => expect(app.workerPool.running).toBe(0));
		expect(appended).toBeGreaterThanOrEqual(1);
	});

	it("should resolve closed once stopped", async () => {
		const { app } = createApp();
		app.get("/", (app, req, res) => res.send("home"));

		await serve(app);
		const running = server;
		if (!running) throw new Error("Expected a running server");

		await running.stop();
		await expect(running.closed).resolves.toBeUndefined();
		expect(app.workerPool.isClosed).toBe(true);
		server = undefined;
	});
});

describe("toOutgoingHeaders", () => {
	it("should group repeated names into arrays", () => {
		const headers = toOutgoingHeaders([
			["Set-Cookie", "name=Jane"],
			["set-cookie", "theme=dark"],
			["Content-Type", "text/plain"],
		]);

		expect(headers).toEqual({ "set-cookie": ["name=Jane", "theme=dark"], "content-type": "text/plain" });
	});
});

describe("currentListenerId", () => {
	afterEach(() => {
		delete process.env[LISTENER_ENV];
	});

	it("should read the listener number from the environment", () => {
		expect(currentListenerId()).toBe(1);

		process.env[LISTENER_ENV] = "3";
		expect(currentListenerId()).toBe(3);

		process.env[LISTENER_ENV] = "not-a-number";
		expect(currentListenerId()).toBe(1);
	});
});
