export type SourceFormat = "djot" | "markdown";

export interface DirEntry {
  kind: "dir";
  /** Number of path segments from the site root (root itself is 0) */
  depth: number;
  /** POSIX path relative to the site root ("" for the root) */
  relativePath: string;
}

export interface PageEntry {
  kind: "page";
  /** Number of path segments from the site root (index.html is 1) */
  depth: number;
  /** POSIX path relative to the site root, always ending in .html */
  relativePath: string;
  /** Page title from frontmatter, or the file stem */
  title: string;
  /** Rendered HTML, still holding the table of contents marker */
  html: string;
}

export type LedgerEntry = DirEntry | PageEntry;

/** Pass one output, in pre-order walk order */
export type Ledger = readonly LedgerEntry[];

export interface NavNode {
  /** Display name (folder name or file stem) */
  name: string;
  /** POSIX path relative to the site root */
  path: string;
  /** Whether this is a page or directory */
  type: "file" | "directory";
  /** Child nodes for directories, in ledger order */
  children: NavNode[];
}
