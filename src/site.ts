import { mkdir, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { SiteWalker } from "./content/walker";
import type { Ledger, PageEntry } from "./content/types";
import { createReporter, type SiteError } from "./errors";
import { createLogger, type Logger } from "./log";
import { TOC_MARKER } from "./render/templates";
import { buildNavTree, renderTableOfContents } from "./render/toc";

export interface SiteOptions {
  /** Source directory, or a single document */
  source: string;
  /** Output directory */
  output: string;
  /** Remove the output directory first */
  clean?: boolean;
  /** Prefix for every generated internal link */
  linkPrefix?: string;
  /** Forced template HTML, overriding any template.html */
  template?: string | null;
  /** Escalate warnings to errors */
  strict?: boolean;
  /** Highlight code blocks (default true) */
  highlight?: boolean;
  logger?: Logger;
}

export interface SiteResult {
  /** Output paths of written pages, relative to the output directory */
  pages: string[];
  /** Output paths of copied assets */
  assets: string[];
  warnings: readonly SiteError[];
}

/**
 * Substitute each page's table of contents and return the final HTML per
 * output path
 */
export function assemblePages(
  ledger: Ledger,
  linkPrefix: string
): Array<{ relativePath: string; html: string }> {
  const tree = buildNavTree(ledger);

  return ledger
    .filter((entry): entry is PageEntry => entry.kind === "page")
    .map((page) => {
      const toc = renderTableOfContents(tree, page, linkPrefix);
      return {
        relativePath: page.relativePath,
        html: page.html.replaceAll(TOC_MARKER, () => toc),
      };
    });
}

/**
 * Build a static site from a source directory (or one document)
 */
export async function generateSite(options: SiteOptions): Promise<SiteResult> {
  const logger = options.logger ?? createLogger();
  const reporter = createReporter({ strict: options.strict ?? false, logger });
  const source = resolve(options.source);
  const output = resolve(options.output);
  const linkPrefix = options.linkPrefix ?? "";

  const stats = await stat(source).catch((error: unknown) => {
    throw new Error(`Cannot read target path ${source}`, { cause: error });
  });
  if (!stats.isDirectory() && !stats.isFile()) {
    throw new Error(`Target path ${source} is not a file or a directory.`);
  }
  const isDirectory = stats.isDirectory();

  if (options.clean) {
    logger.debug(`Cleaning output path ${output}...`);
    await rm(output, { recursive: true, force: true });
  }
  await mkdir(output, { recursive: true });

  logger.info("1/3: Site generation and indexing...");
  const walker = new SiteWalker(isDirectory ? source : dirname(source), {
    outputRoot: output,
    linkPrefix,
    template: options.template ?? null,
    highlight: options.highlight ?? true,
    reporter,
    logger,
  });
  const ledger = isDirectory ? await walker.walk() : await walker.walkFile(source);

  logger.info("2/3: Generating table of contents and saving...");
  const pages = assemblePages(ledger, linkPrefix);
  for (const page of pages) {
    const target = join(output, page.relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, page.html, "utf-8");
    logger.debug(`Wrote ${page.relativePath}`);
  }

  logger.info("3/3: Done!");

  return {
    pages: pages.map((page) => page.relativePath),
    assets: [...walker.assets],
    warnings: reporter.warnings,
  };
}
