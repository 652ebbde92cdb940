import { extname } from "node:path";
import type { SourceFormat } from "./types";

export const RENDERED_EXTENSION = ".html";

/** Reserved file name, consumed as a page template rather than copied */
export const TEMPLATE_FILENAME = "template.html";

/** Landing documents expected at the top of the site root */
export const INDEX_FILENAMES = ["index.dj", "index.djot", "index.md"];

const FORMATS: Record<string, SourceFormat> = {
  ".dj": "djot",
  ".djot": "djot",
  ".md": "markdown",
};

/**
 * Markup format for a path, or null if the extension is not recognized
 */
export function formatForPath(path: string): SourceFormat | null {
  return FORMATS[extname(path).toLowerCase()] ?? null;
}

/**
 * Swap a path's extension for the rendered one
 * e.g., "guides/setup.md" -> "guides/setup.html"
 */
export function withRenderedExtension(path: string): string {
  const ext = extname(path);
  return `${path.slice(0, path.length - ext.length)}${RENDERED_EXTENSION}`;
}
