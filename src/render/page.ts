import matter from "gray-matter";
import type { SourceFormat } from "../content/types";
import { renderDjot } from "./djot";
import type { LinkContext } from "./links";
import { renderMarkdown } from "./markdown";
import { wrapHtmlContent } from "./templates";

export interface PageRenderOptions extends LinkContext {
  highlight: boolean;
  /** Title used when the document has no frontmatter title */
  fallbackTitle: string;
}

export interface RenderedPage {
  title: string;
  html: string;
}

function isFrontmatter(data: unknown): data is Record<string, unknown> {
  return (
    typeof data === "object" &&
    data !== null &&
    !Array.isArray(data) &&
    Object.keys(data).length > 0
  );
}

/**
 * Split off YAML frontmatter, if any. A leading block that does not parse
 * to a mapping is document content (an opening thematic break).
 */
function splitFrontmatter(raw: string): { title?: string; body: string } {
  if (!raw.startsWith("---")) {
    return { body: raw };
  }

  let parsed: { data: unknown; content: string };
  try {
    parsed = matter(raw);
  } catch {
    // Not YAML, so not frontmatter
    return { body: raw };
  }
  if (!isFrontmatter(parsed.data)) {
    return { body: raw };
  }

  const title = parsed.data.title;
  return {
    title: typeof title === "string" || typeof title === "number"
      ? String(title)
      : undefined,
    body: parsed.content,
  };
}

/**
 * Render one document and wrap it in its template. Any table of contents
 * marker in the template is left for the second pass.
 */
export async function renderPage(
  text: string,
  format: SourceFormat,
  options: PageRenderOptions,
  template: string | null
): Promise<RenderedPage> {
  const { title, body } = splitFrontmatter(text);

  const fragment =
    format === "markdown"
      ? await renderMarkdown(body, options)
      : await renderDjot(body, options);

  const pageTitle = title ?? options.fallbackTitle;
  return {
    title: pageTitle,
    html: wrapHtmlContent(fragment, template, pageTitle),
  };
}
