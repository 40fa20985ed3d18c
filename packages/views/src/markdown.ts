import { Marked } from "marked";
import markedFootnote from "marked-footnote";

/** GitHub-flavoured Markdown (tables included) with footnotes */
const markdown = new Marked({ gfm: true, breaks: false }).use(markedFootnote());

/**
 * Converts Markdown to HTML.
 *
 * @example
 * ```typescript
 * markdownToHtml("# Title"); // "<h1>Title</h1>\n"
 * ```
 */
export function markdownToHtml(text: string): string {
	const html = markdown.parse(text, { async: false });
	if (typeof html !== "string") throw new TypeError("Markdown rendering must be synchronous");
	return html;
}
