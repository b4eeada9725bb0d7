import { describe, expect, test } from "vitest";
import { collectReferences, extractLinkTargets } from "../src/core/links/extract";
import { outlineMarkdown, sectionLines } from "../src/core/markdown/outline";

describe("outlineMarkdown", () => {
  test("separates headings, code blocks and prose", () => {
    const outline = outlineMarkdown(
      "# Title\n\n## One\n```ts\n# not heading\n```\n## Two ##\n~~~\ncode\n~~~",
    );
    expect(outline.headings).toEqual([
      { level: 1, text: "Title", line: 0 },
      { level: 2, text: "One", line: 2 },
      { level: 2, text: "Two", line: 6 },
    ]);
    expect(outline.codeBlocks).toEqual([
      { language: "ts", line: 3 },
      { language: null, line: 7 },
    ]);
    expect(outline.proseLines).toEqual([
      "# Title",
      "",
      "## One",
      "",
      "",
      "",
      "## Two ##",
      "",
      "",
      "",
    ]);
  });

  test("keeps a hash that belongs to the heading text", () => {
    expect(outlineMarkdown("## C#").headings).toEqual([
      { level: 2, text: "C#", line: 0 },
    ]);
  });

  test("runs an unclosed fence to the end of the body", () => {
    const outline = outlineMarkdown("```\ncode\n[x](y.md)");
    expect(outline.proseLines).toEqual(["", "", ""]);
    expect(extractLinkTargets(outline.proseLines)).toEqual([]);
  });
});

describe("sectionLines", () => {
  test("stops at the next heading of the same level", () => {
    const outline = outlineMarkdown(
      "## Related Documents\n- [A](a.md)\n### Sub\n- [B](b.md)\n## Next\ntext",
    );
    expect(sectionLines(outline, 2, "related documents")).toEqual([
      "- [A](a.md)",
      "### Sub",
      "- [B](b.md)",
    ]);
    expect(sectionLines(outline, 2, "Missing")).toBeNull();
  });
});

describe("extractLinkTargets", () => {
  test("collects links and images and skips inline code", () => {
    expect(
      extractLinkTargets([
        'See [B](./b.md) and ![img](img/a.png "Logo")',
        "`[x](y.md)` inline",
        "[A](<with space.md>)",
      ]),
    ).toEqual(["./b.md", "img/a.png", "with space.md"]);
  });
});

describe("collectReferences", () => {
  test("lists body links before related entries and ignores fenced code", () => {
    const outline = outlineMarkdown("[a](a.md)\n```\n[b](b.md)\n```");
    expect(collectReferences(outline, ["./c.md"])).toEqual([
      { target: "a.md", origin: "body" },
      { target: "./c.md", origin: "related" },
    ]);
  });
});
