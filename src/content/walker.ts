import { existsSync, type Dirent } from "node:fs";
import { copyFile, mkdir, readdir, readFile, stat } from "node:fs/promises";
import { basename, dirname, isAbsolute, join, posix, relative, resolve, sep } from "node:path";
import { SiteError, type Reporter } from "../errors";
import type { Logger } from "../log";
import { renderPage } from "../render/page";
import { TemplateResolver } from "../render/templates";
import {
  formatForPath,
  INDEX_FILENAMES,
  TEMPLATE_FILENAME,
  withRenderedExtension,
} from "./formats";
import type { LedgerEntry, PageEntry, SourceFormat } from "./types";

export interface WalkOptions {
  /** Directory to write copied assets into */
  outputRoot: string;
  /** Prepended to rewritten cross-document links */
  linkPrefix: string;
  /** Forced template; wins over any template.html */
  template: string | null;
  highlight: boolean;
  reporter: Reporter;
  logger: Logger;
}

type EntryKind = "directory" | "file";

interface WalkEntry {
  name: string;
  path: string;
  kind: EntryKind;
}

/**
 * Path of `fullPath` relative to `root` in POSIX form, or null if it is
 * not strictly inside `root`
 */
export function toRelativePath(fullPath: string, root: string): string | null {
  const rel = relative(resolve(root), resolve(fullPath));
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }
  return rel.split(sep).join("/");
}

/**
 * Whether the site root holds a landing document
 */
export function hasIndexPage(root: string): boolean {
  return INDEX_FILENAMES.some((name) => existsSync(join(root, name)));
}

/**
 * Sort: index documents first, then directories, then files; by name
 * within each group so the walk is repeatable
 */
function compareEntries(a: WalkEntry, b: WalkEntry): number {
  const rank = (entry: WalkEntry) =>
    entry.kind === "file" && INDEX_FILENAMES.includes(entry.name)
      ? 0
      : entry.kind === "directory"
        ? 1
        : 2;

  const byRank = rank(a) - rank(b);
  if (byRank !== 0) return byRank;
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * First pass over a source tree. Copies static assets into the output as
 * it goes and records one ledger entry per directory and rendered page.
 * Page HTML is held in the ledger until the second pass fills in the
 * table of contents.
 */
export class SiteWalker {
  private ledger: LedgerEntry[] = [];
  private copiedAssets: string[] = [];
  private templates: TemplateResolver;
  private sourceRoot: string;
  private outputRoot: string;

  constructor(sourceRoot: string, private readonly options: WalkOptions) {
    this.sourceRoot = resolve(sourceRoot);
    this.outputRoot = resolve(options.outputRoot);
    this.templates = new TemplateResolver(this.sourceRoot);
  }

  /** Relative output paths of copied assets */
  get assets(): readonly string[] {
    return this.copiedAssets;
  }

  /**
   * Walk the whole source directory
   */
  async walk(): Promise<LedgerEntry[]> {
    if (!hasIndexPage(this.sourceRoot)) {
      this.options.reporter.report(SiteError.missingIndex());
    }

    this.ledger.push({ kind: "dir", depth: 0, relativePath: "" });
    await this.scanDirectory(this.sourceRoot);
    return this.ledger;
  }

  /**
   * Render a single document whose directory is treated as the site root
   */
  async walkFile(filePath: string): Promise<LedgerEntry[]> {
    const absolutePath = resolve(filePath);
    const format = formatForPath(absolutePath);
    if (!format) {
      throw new Error(`File ${absolutePath} is not a djot or markdown document`);
    }

    this.ledger.push(
      await this.renderDocument(absolutePath, basename(absolutePath), format)
    );
    return this.ledger;
  }

  private async scanDirectory(dirPath: string): Promise<void> {
    let dirents: Dirent[];
    try {
      dirents = await readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      this.options.reporter.report(SiteError.walkEntry(error));
      return;
    }

    const entries: WalkEntry[] = [];
    for (const dirent of dirents) {
      // Skip hidden files and directories
      if (dirent.name.startsWith(".")) continue;

      const entryPath = join(dirPath, dirent.name);
      if (entryPath === this.outputRoot) {
        this.options.logger.debug(`Skipping output directory ${entryPath}`);
        continue;
      }

      const kind = await this.kindOf(dirent, entryPath);
      if (kind) {
        entries.push({ name: dirent.name, path: entryPath, kind });
      }
    }

    for (const entry of entries.sort(compareEntries)) {
      await this.processEntry(entry);
    }
  }

  private async kindOf(dirent: Dirent, path: string): Promise<EntryKind | null> {
    if (dirent.isDirectory()) return "directory";
    if (dirent.isFile()) return "file";
    if (!dirent.isSymbolicLink()) return null;

    try {
      const stats = await stat(path);
      // Linked directories are not descended into
      if (stats.isDirectory()) {
        this.options.logger.debug(`Skipping linked directory ${path}`);
        return null;
      }
      return stats.isFile() ? "file" : null;
    } catch (error) {
      this.options.reporter.report(SiteError.walkEntry(error));
      return null;
    }
  }

  private async processEntry(entry: WalkEntry): Promise<void> {
    const relativePath = toRelativePath(entry.path, this.sourceRoot);
    if (relativePath === null) {
      this.options.reporter.report(SiteError.pathNotRelative(entry.path));
      return;
    }
    const depth = relativePath.split("/").length;
    this.options.logger.debug(`${relativePath} :: ${depth}`);

    if (entry.kind === "directory") {
      this.ledger.push({ kind: "dir", depth, relativePath });
      await this.scanDirectory(entry.path);
      return;
    }

    if (entry.name === TEMPLATE_FILENAME) {
      this.options.logger.debug(`Path ${relativePath} is a template, skipping`);
      return;
    }

    const format = formatForPath(entry.name);
    if (format) {
      this.ledger.push(await this.renderDocument(entry.path, relativePath, format));
    } else {
      await this.copyAsset(entry.path, relativePath);
    }
  }

  private async renderDocument(
    path: string,
    relativePath: string,
    format: SourceFormat
  ): Promise<PageEntry> {
    const sourceDir = dirname(path);
    const text = await readFile(path, "utf-8");
    const template =
      this.options.template ?? (await this.templates.find(sourceDir));
    const outputPath = withRenderedExtension(relativePath);

    this.options.logger.debug(`Rendering ${relativePath} -> ${outputPath}`);

    const page = await renderPage(
      text,
      format,
      {
        sourceDir,
        siteRoot: this.sourceRoot,
        linkPrefix: this.options.linkPrefix,
        reporter: this.options.reporter,
        highlight: this.options.highlight,
        fallbackTitle: posix.parse(relativePath).name,
      },
      template
    );

    return {
      kind: "page",
      depth: relativePath.split("/").length,
      relativePath: outputPath,
      title: page.title,
      html: page.html,
    };
  }

  private async copyAsset(path: string, relativePath: string): Promise<void> {
    const target = join(this.outputRoot, relativePath);
    await mkdir(dirname(target), { recursive: true });
    await copyFile(path, target);
    this.copiedAssets.push(relativePath);
    this.options.logger.debug(`Copied ${relativePath}`);
  }
}
