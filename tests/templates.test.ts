import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  CONTENT_MARKER,
  loadTemplate,
  TemplateResolver,
  TOC_MARKER,
  wrapHtmlContent,
} from "../src/render/templates";
import { makeTree, removeTree } from "./helpers";

describe("wrapHtmlContent", () => {
  test("returns the fragment when there is no template", () => {
    expect(wrapHtmlContent("<p>x</p>", null, "x")).toBe("<p>x</p>");
  });

  test("substitutes content and title, leaving the contents marker", () => {
    const template = `<title><!-- {TITLE} --></title>${CONTENT_MARKER}${TOC_MARKER}`;
    expect(wrapHtmlContent("<p>$& x</p>", template, "A & B")).toBe(
      `<title>A &amp; B</title><p>$& x</p>${TOC_MARKER}`
    );
  });
});

describe("TemplateResolver", () => {
  let root: string;

  beforeAll(async () => {
    root = await makeTree({
      "template.html": "ROOT",
      "a/b/page.dj": "",
      "c/template.html": "C",
      "c/d/page.dj": "",
    });
  });

  afterAll(async () => {
    await removeTree(root);
  });

  test("uses the nearest template walking up", async () => {
    const resolver = new TemplateResolver(root);
    expect(await resolver.find(join(root, "a/b"))).toBe("ROOT");
    expect(await resolver.find(join(root, "c/d"))).toBe("C");
    expect(await resolver.find(join(root, "c"))).toBe("C");
    expect(await resolver.find(root)).toBe("ROOT");
  });

  test("does not look above the site root", async () => {
    const resolver = new TemplateResolver(join(root, "a"));
    expect(await resolver.find(join(root, "a/b"))).toBeNull();
  });
});

describe("loadTemplate", () => {
  test("loads built-in templates by name", async () => {
    for (const name of ["default", "minimal"]) {
      const template = await loadTemplate(name);
      expect(template).toContain(CONTENT_MARKER);
      expect(template).toContain(TOC_MARKER);
    }
  });

  test("reads a template file relative to the base directory", async () => {
    const root = await makeTree({ "layouts/site.html": "<main><!-- {CONTENT} --></main>" });
    expect(await loadTemplate("layouts/site.html", root)).toBe("<main><!-- {CONTENT} --></main>");
    await removeTree(root);
  });

  test("rejects unknown names", async () => {
    await expect(loadTemplate("fancy", "/nonexistent")).rejects.toThrow(
      'Template "fancy" is neither a built-in template (default, minimal) nor an existing file'
    );
  });
});
