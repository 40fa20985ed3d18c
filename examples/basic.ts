import { fileURLToPath } from "node:url";
import { Levels } from "@rabbit-company/logger";
import { createWebLogger, HttpError, Web } from "../packages/core/src";
import type { HttpRequest, ResponseWriter } from "../packages/core/src";
import { createViewEngine, serveFiles } from "../packages/views/src";

/**
 * Example application
 *
 * Run with `npm run example`, then try:
 * - GET  /                     static HTML page
 * - GET  /hello/Jane/Doe       template with a Markdown section and a visit counter
 * - GET  /settings             reads the "name" cookie
 * - POST /login                form login setting the "name" cookie
 * - GET  /redirect             redirects after 3 seconds
 * - GET  /streaming            streams three chunks, one per second
 * - GET  /static/css/site.css  static file
 */

const logger = createWebLogger({ level: Levels.HTTP });

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Visit counter shared by every copy of the application within one listener process */
class Counter {
	private count = 0;

	/** Returns the previous value */
	increment(): number {
		return this.count++;
	}
}

class MyApp {
	constructor(readonly counter: Counter) {}

	home(req: HttpRequest, res: ResponseWriter): Promise<void> {
		res.contentType("text/html; charset=utf-8").header("access-control-allow-origin", "*");
		return res.send("<html><head><title>home</title></head><body><h1>Hello, world!</h1></body></html>");
	}

	hello(req: HttpRequest, res: ResponseWriter): Promise<void> {
		const counter = this.counter.increment();

		return res.render("hello", {
			first_name: req.param("first_name") ?? "John",
			last_name: req.param("last_name") ?? "Doe",
			counter,
			content: "## Contents\nThis is a list:\n\n- item 1\n- item 2\n",
		});
	}

	settings(req: HttpRequest, res: ResponseWriter): Promise<void> {
		logger.log(Levels.INFO, `name cookie: ${req.cookie("name") ?? "nope"}`);

		res.contentType("text/html; charset=utf-8");
		return res.send("<html><head><title>Settings</title></head><body><h1>Settings</h1></body></html>");
	}

	login(req: HttpRequest, res: ResponseWriter): Promise<void> {
		return res.handle(() => {
			const { username } = req.form();
			if (username !== undefined) {
				if (username === "error") throw new HttpError(400, "bad user name: error");
				res.cookie("name", username, { domain: "localhost", httpOnly: true });
			}
			return 204;
		});
	}

	async redirect(req: HttpRequest, res: ResponseWriter): Promise<void> {
		logger.log(Levels.INFO, "waiting 3 seconds");
		await sleep(3000);
		await res.redirect("http://example.com");
	}

	async streaming(req: HttpRequest, res: ResponseWriter): Promise<void> {
		const stream = res.stream();
		await stream.append("toto");
		await sleep(1000);

		await stream.append("tata");
		await sleep(1000);

		await stream.append("titi");
	}

	before(req: HttpRequest): void {
		logger.log(Levels.DEBUG, `hello middleware for request ${req.pathname}`);
	}
}

const views = createViewEngine({ directory: fileURLToPath(new URL("./views", import.meta.url)) })
	.registerPartials()
	.register("hello");

const app = new Web<MyApp>({ logger, views });

app.get("/", (app, req, res) => app.home(req, res));
app.get("/hello/:first_name/:last_name", (app, req, res) => app.hello(req, res));
app.get("/settings", (app, req, res) => app.settings(req, res));

app.get("/redirect", (app, req, res) => app.redirect(req, res));
app.get("/streaming", (app, req, res) => app.streaming(req, res));

app.post("/login", (app, req, res) => app.login(req, res));

app.registerStaticMount("/static", serveFiles(fileURLToPath(new URL("./web", import.meta.url))));

app.registerMiddleware((app, req) => app.before(req));

const port = Number(process.env.PORT ?? 3000);

app.startWith(new MyApp(new Counter()), { port, hostname: "0.0.0.0" }).catch((error: unknown) => {
	logger.log(Levels.ERROR, "Server failed", { error: error instanceof Error ? error.message : String(error) });
	process.exit(1);
});
