import { randomUUID } from "node:crypto";
import { createHighlighter, type Highlighter } from "shiki";
import { escapeHtml } from "./html";

let highlighterPromise: Promise<Highlighter> | null = null;

/**
 * Get or create the Shiki highlighter instance
 */
export async function getHighlighter(): Promise<Highlighter> {
  if (!highlighterPromise) {
    highlighterPromise = createHighlighter({
      themes: ["github-dark", "github-light"],
      langs: [
        "typescript",
        "javascript",
        "json",
        "bash",
        "shell",
        "markdown",
        "html",
        "css",
        "yaml",
        "toml",
        "python",
        "go",
        "rust",
        "c",
        "sql",
        "diff",
      ],
    });
  }

  return highlighterPromise;
}

/**
 * Code block without highlighting, in the shape both renderers emit
 */
export function plainCodeBlock(code: string, lang: string): string {
  const cls = lang ? ` class="language-${escapeHtml(lang)}"` : "";
  return `<pre><code${cls}>${escapeHtml(code)}</code></pre>\n`;
}

/**
 * Highlight code using Shiki
 */
export async function highlightCode(
  code: string,
  lang: string
): Promise<string> {
  const highlighter = await getHighlighter();
  const loaded: string[] = highlighter.getLoadedLanguages();

  // Fall back to plain text if language not supported
  const language = loaded.includes(lang) ? lang : "text";

  try {
    return highlighter.codeToHtml(code, {
      lang: language,
      themes: {
        light: "github-light",
        dark: "github-dark",
      },
    });
  } catch {
    return plainCodeBlock(code, lang);
  }
}

interface PendingBlock {
  placeholder: string;
  code: string;
  lang: string;
}

/**
 * Queue of code blocks replaced by placeholders during synchronous
 * rendering, highlighted afterwards.
 */
export class CodeBlockQueue {
  private blocks: PendingBlock[] = [];
  // Raw HTML in a document must never match a placeholder
  private readonly nonce = randomUUID();

  constructor(private readonly highlight: boolean) {}

  /** Placeholder (or plain block, when highlighting is off) for a code block */
  add(code: string, lang: string): string {
    if (!this.highlight) {
      return plainCodeBlock(code, lang);
    }
    const placeholder = `<!-- CODE_BLOCK_${this.nonce}_${this.blocks.length} -->`;
    this.blocks.push({ placeholder, code, lang });
    return placeholder;
  }

  /** Swap every placeholder in html for its highlighted block */
  async resolve(html: string): Promise<string> {
    let result = html;
    for (const block of this.blocks) {
      const highlighted = await highlightCode(block.code, block.lang);
      result = result.replace(block.placeholder, () => highlighted);
    }
    return result;
  }
}
