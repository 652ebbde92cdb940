import { parse, renderHTML } from "@djot/djot";
import { CodeBlockQueue } from "./highlight";
import { rewriteLinkDestination, type LinkContext } from "./links";

export interface DjotRenderOptions extends LinkContext {
  /** Highlight code blocks with Shiki */
  highlight: boolean;
}

/** AST nodes whose destination is a link target */
const LINK_TAGS = new Set(["link", "reference"]);

/**
 * Rewrite link destinations in place, visiting inline links and
 * reference definitions alike
 */
function rewriteLinks(node: unknown, rewrite: (destination: string) => string) {
  if (typeof node !== "object" || node === null) return;

  if (
    "tag" in node &&
    typeof node.tag === "string" &&
    LINK_TAGS.has(node.tag) &&
    "destination" in node &&
    typeof node.destination === "string"
  ) {
    node.destination = rewrite(node.destination);
  }

  if ("children" in node && Array.isArray(node.children)) {
    for (const child of node.children) {
      rewriteLinks(child, rewrite);
    }
  }

  // Reference definitions and footnotes hang off the document root
  for (const table of [
    "references" in node ? node.references : null,
    "footnotes" in node ? node.footnotes : null,
  ]) {
    if (typeof table === "object" && table !== null) {
      for (const entry of Object.values(table)) {
        rewriteLinks(entry, rewrite);
      }
    }
  }
}

/**
 * Render djot to an HTML fragment
 */
export async function renderDjot(
  djot: string,
  options: DjotRenderOptions
): Promise<string> {
  const doc = parse(djot);
  rewriteLinks(doc, (destination) =>
    rewriteLinkDestination(destination, options)
  );

  const codeBlocks = new CodeBlockQueue(options.highlight);
  const html = renderHTML(doc, {
    overrides: {
      code_block: (node) => codeBlocks.add(node.text, node.lang ?? ""),
    },
  });

  return codeBlocks.resolve(html);
}
