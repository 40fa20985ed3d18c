export { createViewEngine, ViewEngine } from "./engine";
export type { ViewEngineOptions } from "./engine";
export { resolveSafePath, serveFiles } from "./files";
export { markdownToHtml } from "./markdown";
