import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve } from "node:path";
import { TEMPLATE_FILENAME } from "../content/formats";
import { escapeHtml } from "./html";

/** Replaced by the rendered document body */
export const CONTENT_MARKER = "<!-- {CONTENT} -->";
/** Replaced by the generated table of contents in the second pass */
export const TOC_MARKER = "<!-- {TABLE_OF_CONTENTS} -->";
/** Replaced by the page title */
export const TITLE_MARKER = "<!-- {TITLE} -->";

const STYLES = `
    * { box-sizing: border-box; }
    body { margin: 0; font-family: system-ui, sans-serif; line-height: 1.6; color: #111827; }
    .layout { display: flex; min-height: 100vh; }
    aside { width: 16rem; flex-shrink: 0; border-right: 1px solid #e5e7eb; padding: 1rem; background: #f9fafb; }
    aside ul { list-style: none; margin: 0; padding-left: 0.75rem; }
    aside > nav > ul { padding-left: 0; }
    aside li { padding: 0.125rem 0; }
    main { flex: 1; padding: 2rem; }
    article { max-width: 65ch; margin: 0 auto; }
    pre { background: #f3f4f6; padding: 1rem; border-radius: 0.5rem; overflow-x: auto; }
    code { font-family: ui-monospace, monospace; }
    a { color: #2563eb; }
    h1, h2, h3, h4, h5, h6 { margin-top: 1.5em; margin-bottom: 0.5em; font-weight: 600; }
    a.anchor { color: inherit; text-decoration: none; }
    table { border-collapse: collapse; margin-bottom: 1em; }
    th, td { border: 1px solid #e5e7eb; padding: 0.5rem; }
    .shiki { background-color: var(--shiki-light-bg) !important; }
    .shiki span { color: var(--shiki-light); }
    @media (prefers-color-scheme: dark) {
      body { background: #111827; color: #f3f4f6; }
      aside { background: #1f2937; border-color: #374151; }
      pre { background: #1f2937; }
      a { color: #60a5fa; }
      .shiki { background-color: var(--shiki-dark-bg) !important; }
      .shiki span { color: var(--shiki-dark); }
    }
`;

/**
 * Sidebar layout with the table of contents beside the article
 */
function defaultTemplate(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${TITLE_MARKER}</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="layout">
    <aside>
      <nav>${TOC_MARKER}</nav>
    </aside>
    <main>
      <article>
${CONTENT_MARKER}
      </article>
    </main>
  </div>
</body>
</html>
`;
}

/**
 * Bare document with the table of contents above the content
 */
function minimalTemplate(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${TITLE_MARKER}</title>
</head>
<body>
<nav>${TOC_MARKER}</nav>
<hr>
${CONTENT_MARKER}
</body>
</html>
`;
}

export const BUILT_IN_TEMPLATES = {
  default: defaultTemplate,
  minimal: minimalTemplate,
} satisfies Record<string, () => string>;

export type BuiltInTemplate = keyof typeof BUILT_IN_TEMPLATES;

export function isBuiltInTemplate(name: string): name is BuiltInTemplate {
  return Object.hasOwn(BUILT_IN_TEMPLATES, name);
}

/**
 * Load a forced template: a built-in name, or a path to an HTML file
 */
export async function loadTemplate(
  nameOrPath: string,
  baseDir: string = process.cwd()
): Promise<string> {
  if (isBuiltInTemplate(nameOrPath)) {
    return BUILT_IN_TEMPLATES[nameOrPath]();
  }

  const templatePath = resolve(baseDir, nameOrPath);
  if (!existsSync(templatePath)) {
    const names = Object.keys(BUILT_IN_TEMPLATES).join(", ");
    throw new Error(
      `Template "${nameOrPath}" is neither a built-in template (${names}) nor an existing file`
    );
  }
  return readFile(templatePath, "utf-8");
}

/**
 * Finds the nearest template.html for a document, walking up from its
 * directory to the site root. Lookups are cached per directory.
 */
export class TemplateResolver {
  private cache = new Map<string, string | null>();
  private siteRoot: string;

  constructor(siteRoot: string) {
    this.siteRoot = resolve(siteRoot);
  }

  async find(documentDir: string): Promise<string | null> {
    const dir = resolve(documentDir);
    const cached = this.cache.get(dir);
    if (cached !== undefined) {
      return cached;
    }

    let template: string | null = null;
    const candidate = join(dir, TEMPLATE_FILENAME);
    if (existsSync(candidate)) {
      template = await readFile(candidate, "utf-8");
    } else if (dir !== this.siteRoot && isInside(this.siteRoot, dir)) {
      template = await this.find(dirname(dir));
    }

    this.cache.set(dir, template);
    return template;
  }
}

function isInside(root: string, path: string): boolean {
  const rel = relative(root, path);
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
}

/**
 * Substitute a rendered fragment into a template. Without a template the
 * fragment is returned as is.
 */
export function wrapHtmlContent(
  content: string,
  template: string | null,
  title: string
): string {
  if (template === null) {
    return content;
  }

  return template
    .replaceAll(TITLE_MARKER, escapeHtml(title))
    .replaceAll(CONTENT_MARKER, () => content);
}
