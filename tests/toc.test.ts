import { describe, expect, test } from "vitest";
import type { LedgerEntry } from "../src/content/types";
import { assembleTableOfContents, buildNavTree } from "../src/render/toc";

function dir(relativePath: string): LedgerEntry {
  return {
    kind: "dir",
    depth: relativePath === "" ? 0 : relativePath.split("/").length,
    relativePath,
  };
}

function page(relativePath: string): LedgerEntry {
  return {
    kind: "page",
    depth: relativePath.split("/").length,
    relativePath,
    title: relativePath,
    html: "",
  };
}

const siteLedger: LedgerEntry[] = [
  dir(""),
  page("index.html"),
  dir("nested2"),
  page("nested2/hey.html"),
  dir("nested3"),
  page("nested3/third_file.html"),
];

describe("assembleTableOfContents", () => {
  test("marks the root page as current", () => {
    expect(assembleTableOfContents(siteLedger, 1, "index.html", "")).toBe(
      "<ul>" +
        "<li><b>index</b></li>" +
        "<li><b><u>nested2:</u></b></li><ul><li><a href=\"nested2/hey.html\">hey</a></li></ul>" +
        "<li><b><u>nested3:</u></b></li><ul><li><a href=\"nested3/third_file.html\">third_file</a></li></ul>" +
        "</ul>"
    );
  });

  test("climbs one level for pages in a subfolder", () => {
    expect(assembleTableOfContents(siteLedger, 2, "nested2/hey.html", "")).toBe(
      "<ul>" +
        "<li><a href=\"../index.html\">index</a></li>" +
        "<li><b><u>nested2:</u></b></li><ul><li><b>hey</b></li></ul>" +
        "<li><b><u>nested3:</u></b></li><ul><li><a href=\"../nested3/third_file.html\">third_file</a></li></ul>" +
        "</ul>"
    );
  });

  test("shows sibling folders with the heading before their pages", () => {
    const ledger = [dir(""), dir("a"), page("a/one.html"), dir("b"), page("b/two.html")];
    expect(assembleTableOfContents(ledger, 2, "a/one.html", "site/")).toBe(
      "<ul>" +
        "<li><b><u>a:</u></b></li><ul><li><b>one</b></li></ul>" +
        "<li><b><u>b:</u></b></li><ul><li><a href=\"../site/b/two.html\">two</a></li></ul>" +
        "</ul>"
    );
  });

  test("drops trailing empty folders without unbalancing the lists", () => {
    const ledger = [
      dir(""),
      page("index.html"),
      dir("docs"),
      page("docs/guide.html"),
      dir("docs/empty"),
      dir("docs/empty/deeper"),
      dir("zzz"),
    ];
    expect(assembleTableOfContents(ledger, 1, "index.html", "")).toBe(
      "<ul>" +
        "<li><b>index</b></li>" +
        "<li><b><u>docs:</u></b></li><ul><li><a href=\"docs/guide.html\">guide</a></li></ul>" +
        "</ul>"
    );
  });

  test("does not nest a folder under an empty sibling", () => {
    const ledger = [dir(""), page("index.html"), dir("assets"), dir("guides"), page("guides/a.html")];
    expect(assembleTableOfContents(ledger, 1, "index.html", "")).toBe(
      "<ul>" +
        "<li><b>index</b></li>" +
        "<li><b><u>guides:</u></b></li><ul><li><a href=\"guides/a.html\">a</a></li></ul>" +
        "</ul>"
    );
  });

  test("keeps headings for folders that only hold subfolders", () => {
    const ledger = [dir(""), dir("outer"), dir("outer/inner"), page("outer/inner/page.html")];
    expect(assembleTableOfContents(ledger, 3, "outer/inner/page.html", "")).toBe(
      "<ul><li><b><u>outer:</u></b></li><ul><li><b><u>inner:</u></b></li><ul><li><b>page</b></li></ul></ul></ul>"
    );
  });

  test("escapes names and links", () => {
    const ledger = [dir(""), page("index.html"), page("q&a.html")];
    expect(assembleTableOfContents(ledger, 1, "index.html", "")).toBe(
      '<ul><li><b>index</b></li><li><a href="q&amp;a.html">q&amp;a</a></li></ul>'
    );
  });

  test("builds a tree for pages whose folders were never recorded", () => {
    const tree = buildNavTree([page("lost/found.html")]);
    expect(tree.children).toEqual([
      {
        name: "lost",
        path: "lost",
        type: "directory",
        children: [{ name: "found", path: "lost/found.html", type: "file", children: [] }],
      },
    ]);
  });
});

/**
 * Deterministic generator for site-shaped ledgers in pre-order
 */
function generateLedger(seed: number): LedgerEntry[] {
  let state = seed;
  const next = (max: number) => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state % max;
  };
  let counter = 0;
  const ledger: LedgerEntry[] = [dir("")];

  const fill = (prefix: string, level: number) => {
    const pages = next(3);
    for (let i = 0; i < pages; i++) {
      ledger.push(page(`${prefix}p${counter++}.html`));
    }
    const folders = level < 4 ? next(3) : 0;
    for (let i = 0; i < folders; i++) {
      const path = `${prefix}d${counter++}`;
      ledger.push(dir(path));
      fill(`${path}/`, level + 1);
    }
  };

  fill("", 1);
  return ledger;
}

function count(haystack: string, pattern: RegExp): number {
  return haystack.match(pattern)?.length ?? 0;
}

describe("table of contents properties", () => {
  const ledgers = Array.from({ length: 40 }, (_, i) => generateLedger(i + 1));

  test("every page sees itself as the only unlinked item", () => {
    for (const ledger of ledgers) {
      const pages = ledger.filter((entry) => entry.kind === "page");
      for (const target of pages) {
        const toc = assembleTableOfContents(ledger, target.depth, target.relativePath, "");
        const name = target.relativePath.split("/").pop()?.replace(".html", "");

        expect(count(toc, /<li><b>(?!<u>)/g)).toBe(1);
        expect(toc).toContain(`<li><b>${name}</b></li>`);
        expect(count(toc, /<a /g)).toBe(pages.length - 1);
        expect(count(toc, /<ul>/g)).toBe(count(toc, /<\/ul>/g));
      }
    }
  });

  test("folders appear only as headings, and only when they hold pages", () => {
    for (const ledger of ledgers) {
      const pages = ledger.filter((entry) => entry.kind === "page");
      if (pages.length === 0) continue;
      const target = pages[0];
      const toc = assembleTableOfContents(ledger, target.depth, target.relativePath, "");

      for (const entry of ledger) {
        if (entry.kind !== "dir" || entry.relativePath === "") continue;
        const name = entry.relativePath.split("/").pop();
        const hasPages = pages.some((p) => p.relativePath.startsWith(`${entry.relativePath}/`));

        expect(toc).not.toContain(`href="${entry.relativePath}"`);
        expect(toc.includes(`<li><b><u>${name}:</u></b></li>`)).toBe(hasPages);
      }
    }
  });
});
