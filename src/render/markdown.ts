import { Marked, type Tokens } from "marked";
import type { Reporter, SiteError } from "../errors";
import { CodeBlockQueue } from "./highlight";
import { rewriteLinkDestination, type LinkContext } from "./links";

export interface MarkdownRenderOptions extends LinkContext {
  /** Highlight fenced code with Shiki */
  highlight: boolean;
}

/**
 * Generate a slug from heading text for anchor links
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/<[^>]*>/g, "")
    .replace(/[^\w\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-");
}

/**
 * Create a configured Marked instance for rendering markdown
 */
export function createMarkdownRenderer(
  options: MarkdownRenderOptions,
  codeBlocks: CodeBlockQueue
): Marked {
  const marked = new Marked({ async: false });

  marked.use({
    // Every link destination, inline or reference-style, passes through here
    walkTokens(token) {
      if (token.type === "link") {
        token.href = rewriteLinkDestination(token.href, options);
      }
    },

    renderer: {
      code({ text, lang }: Tokens.Code): string {
        const language = (lang ?? "").split(/\s+/)[0];
        return codeBlocks.add(text, language);
      },

      // Headings with anchor links (except h1 which is the page title)
      heading({ tokens, depth }: Tokens.Heading): string {
        const text = this.parser.parseInline(tokens);

        if (depth === 1) {
          return `<h1>${text}</h1>\n`;
        }

        const slug = slugify(text);
        return `<h${depth} id="${slug}"><a class="anchor" href="#${slug}">${text}</a></h${depth}>\n`;
      },
    },
  });

  return marked;
}

/**
 * Render markdown to an HTML fragment
 */
export async function renderMarkdown(
  markdown: string,
  options: MarkdownRenderOptions
): Promise<string> {
  // marked rewrites the message of anything thrown from walkTokens, so
  // link errors are held until parsing is done and reported from here
  const linkErrors: SiteError[] = [];
  const deferred: Reporter = {
    report(error) {
      linkErrors.push(error);
    },
    warnings: linkErrors,
  };

  const codeBlocks = new CodeBlockQueue(options.highlight);
  const marked = createMarkdownRenderer({ ...options, reporter: deferred }, codeBlocks);
  const html = marked.parse(markdown, { async: false });

  for (const error of linkErrors) {
    options.reporter.report(error);
  }
  return codeBlocks.resolve(html);
}
