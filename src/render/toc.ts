import { posix } from "node:path";
import type { Ledger, NavNode } from "../content/types";
import { escapeHtml } from "./html";

export interface TocTarget {
  /** Ledger path of the page the table of contents is for */
  relativePath: string;
  /** Depth of that page; links climb depth - 1 levels */
  depth: number;
}

function parentPath(path: string): string {
  const parent = posix.dirname(path);
  return parent === "." ? "" : parent;
}

/**
 * Build the navigation tree once from the ledger. Directory order and
 * page order follow the ledger; folders with no pages beneath them are
 * dropped.
 */
export function buildNavTree(ledger: Ledger): NavNode {
  const root: NavNode = { name: "", path: "", type: "directory", children: [] };
  const dirs = new Map<string, NavNode>([["", root]]);

  const ensureDir = (path: string): NavNode => {
    const existing = dirs.get(path);
    if (existing) return existing;

    // Parent was never recorded (e.g. skipped by the walker)
    const node: NavNode = {
      name: posix.basename(path),
      path,
      type: "directory",
      children: [],
    };
    ensureDir(parentPath(path)).children.push(node);
    dirs.set(path, node);
    return node;
  };

  for (const entry of ledger) {
    if (entry.kind === "dir") {
      ensureDir(entry.relativePath);
    } else {
      ensureDir(parentPath(entry.relativePath)).children.push({
        name: posix.parse(entry.relativePath).name,
        path: entry.relativePath,
        type: "file",
        children: [],
      });
    }
  }

  prune(root);
  return root;
}

/**
 * Drop directories without pages; returns whether any page remains
 */
function prune(node: NavNode): boolean {
  if (node.type === "file") return true;
  node.children = node.children.filter(prune);
  return node.children.length > 0;
}

function renderItems(
  nodes: NavNode[],
  target: TocTarget,
  hrefPrefix: string
): string {
  let html = "";

  for (const node of nodes) {
    const name = escapeHtml(node.name);

    if (node.type === "directory") {
      html += `<li><b><u>${name}:</u></b></li>`;
      html += `<ul>${renderItems(node.children, target, hrefPrefix)}</ul>`;
    } else if (node.path === target.relativePath) {
      html += `<li><b>${name}</b></li>`;
    } else {
      const href = escapeHtml(`${hrefPrefix}${node.path}`);
      html += `<li><a href="${href}">${name}</a></li>`;
    }
  }

  return html;
}

/**
 * Render the table of contents as seen from one page: the page itself is
 * bold and unlinked, every other page is a link relative to it, and
 * folders are plain headings introducing a nested list.
 */
export function renderTableOfContents(
  tree: NavNode,
  target: TocTarget,
  linkPrefix: string
): string {
  const up = target.depth > 1 ? "../".repeat(target.depth - 1) : "";
  return `<ul>${renderItems(tree.children, target, up + linkPrefix)}</ul>`;
}

/**
 * One-shot form of {@link buildNavTree} + {@link renderTableOfContents}
 */
export function assembleTableOfContents(
  ledger: Ledger,
  targetDepth: number,
  targetRelativePath: string,
  linkPrefix: string
): string {
  return renderTableOfContents(
    buildNavTree(ledger),
    { depth: targetDepth, relativePath: targetRelativePath },
    linkPrefix
  );
}
