import { existsSync, readdirSync, readFileSync } from "node:fs";
import { basename, extname, join } from "node:path";
import Handlebars from "handlebars";
import { RenderError } from "@threadline/web";
import type { TemplateEngine } from "@threadline/web";
import { markdownToHtml } from "./markdown";

type Template = ReturnType<typeof Handlebars.compile>;

/**
 * Options for configuring the view engine.
 */
export interface ViewEngineOptions {
	/**
	 * Directory holding the templates.
	 * Default: "views"
	 */
	directory?: string;

	/**
	 * Template file extension.
	 * Default: ".hbs"
	 */
	extension?: string;

	/**
	 * Directory holding partials, registered under their file name without extension.
	 * Skipped when it does not exist.
	 * Default: "views/partials"
	 */
	partials?: string;
}

/**
 * Handlebars-backed template engine with a `markdown` helper.
 *
 * @example
 * ```handlebars
 * <article>{{markdown body}}</article>
 * ```
 */
export class ViewEngine implements TemplateEngine {
	private readonly handlebars = Handlebars.create();
	private readonly templates = new Map<string, Template>();
	private readonly directory: string;
	private readonly extension: string;
	private readonly partials: string;

	constructor(options: ViewEngineOptions = {}) {
		this.directory = options.directory ?? "views";
		this.extension = options.extension ?? ".hbs";
		this.partials = options.partials ?? join(this.directory, "partials");

		this.handlebars.registerHelper("markdown", markdownHelper);
	}

	/**
	 * Compiles `<directory>/<name><extension>` and registers it under `name`.
	 *
	 * @throws {RenderError} when the file cannot be read
	 */
	register(name: string): this {
		const path = join(this.directory, `${name}${this.extension}`);

		let source: string;
		try {
			source = readFileSync(path, "utf8");
		} catch (error) {
			throw new RenderError(`Cannot read template "${name}" from ${path}`, { cause: error });
		}

		return this.registerSource(name, source);
	}

	/**
	 * Registers a template from its source text.
	 *
	 * @example
	 * ```typescript
	 * views.registerSource('greeting', 'Hello {{name}}!');
	 * views.render('greeting', { name: 'Jane' }); // "Hello Jane!"
	 * ```
	 */
	registerSource(name: string, source: string): this {
		this.templates.set(name, this.handlebars.compile(source));
		return this;
	}

	/**
	 * Registers every partial found in the partials directory.
	 */
	registerPartials(): this {
		if (!existsSync(this.partials)) return this;

		for (const file of this.templateFiles(this.partials)) {
			const source = readFileSync(join(this.partials, file), "utf8");
			this.handlebars.registerPartial(basename(file, this.extension), source);
		}
		return this;
	}

	/**
	 * Registers the partials and every template in the templates directory.
	 */
	registerAll(): this {
		this.registerPartials();
		for (const file of this.templateFiles(this.directory)) {
			this.register(basename(file, this.extension));
		}
		return this;
	}

	has(name: string): boolean {
		return this.templates.has(name);
	}

	/**
	 * Renders a registered template.
	 *
	 * @throws {RenderError} when the template is unknown or fails while rendering
	 */
	render(name: string, data: Record<string, unknown>): string {
		const template = this.templates.get(name);
		if (!template) throw new RenderError(`Template "${name}" is not registered`);

		try {
			return template(data);
		} catch (error) {
			if (error instanceof RenderError) throw error;
			throw new RenderError(`Failed to render template "${name}"`, { cause: error });
		}
	}

	private templateFiles(directory: string): string[] {
		return readdirSync(directory, { withFileTypes: true })
			.filter((entry) => entry.isFile() && extname(entry.name) === this.extension)
			.map((entry) => entry.name)
			.sort();
	}
}

/**
 * Creates a view engine. Templates still have to be registered.
 *
 * @example
 * ```typescript
 * const views = createViewEngine({ directory: 'views' }).registerPartials().register('hello');
 * app.views(views);
 * ```
 */
export function createViewEngine(options: ViewEngineOptions = {}): ViewEngine {
	return new ViewEngine(options);
}

/**
 * `{{markdown text}}`: renders its first parameter as Markdown, unescaped.
 * Handlebars passes its options object as the last argument.
 */
function markdownHelper(...args: unknown[]): Handlebars.SafeString {
	const params = args.slice(0, -1);
	if (params.length === 0) throw new RenderError('Param not found for helper "markdown"');

	const [text] = params;
	if (typeof text !== "string") throw new RenderError(`Expected a string for helper "markdown", got ${typeof text}`);

	return new Handlebars.SafeString(markdownToHtml(text));
}
