import { extname } from "node:path";

// MIME types for common file extensions
const MIME_TYPES: Record<string, string> = {
	".html": "text/html; charset=utf-8",
	".htm": "text/html; charset=utf-8",
	".css": "text/css; charset=utf-8",
	".js": "text/javascript; charset=utf-8",
	".mjs": "text/javascript; charset=utf-8",
	".json": "application/json; charset=utf-8",
	".xml": "application/xml; charset=utf-8",
	".txt": "text/plain; charset=utf-8",
	".md": "text/markdown; charset=utf-8",
	".csv": "text/csv; charset=utf-8",
	".png": "image/png",
	".jpg": "image/jpeg",
	".jpeg": "image/jpeg",
	".gif": "image/gif",
	".svg": "image/svg+xml",
	".ico": "image/x-icon",
	".webp": "image/webp",
	".woff": "font/woff",
	".woff2": "font/woff2",
	".pdf": "application/pdf",
	".wasm": "application/wasm",
	".map": "application/json",
};

/**
 * Content type for a file path, from its extension.
 *
 * @example
 * ```typescript
 * getMimeType("web/css/site.css"); // "text/css; charset=utf-8"
 * getMimeType("archive.bin"); // "application/octet-stream"
 * ```
 */
export function getMimeType(path: string): string {
	return MIME_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream";
}
