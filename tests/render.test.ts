import { describe, expect, test } from "vitest";
import {
  csvField,
  renderCsv,
  renderDot,
  renderMarkdown,
  renderText,
} from "../src/core/report/render";
import { buildReport, sampleCorpus } from "./helpers";

const trend = {
  previousDate: "2024-04-01",
  previousScore: 50,
  currentScore: 59,
  delta: 9,
};

describe("renderMarkdown", () => {
  test("renders sections in a fixed order", () => {
    const { report } = buildReport(sampleCorpus);
    const lines = renderMarkdown(report, trend).split("\n");
    const order = [
      "## Inventory",
      "## Category Distribution",
      "## Tag Usage",
      "## Relationships",
      "### Orphaned Documents",
      "### Broken References",
      "## Content Quality",
      "## Readability",
      "## Recommendations",
      "## Summary",
    ].map((heading) => lines.indexOf(heading));
    expect(order.every((index) => index >= 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
  });

  test("includes broken references, the score and the trend", () => {
    const { report } = buildReport(sampleCorpus);
    const lines = renderMarkdown(report, trend).split("\n");
    expect(lines).toContain("| docs/a.md | ./gone.md | docs/gone.md | missing |");
    expect(lines).toContain("| Frontmatter coverage | 33% |");
    expect(lines).toContain("Health score: **59/100** (Fair)");
    expect(lines).toContain("Trend: +9 since 2024-04-01 (was 50)");
    expect(lines).toContain("1. **[high]** Fix 1 broken link (run `docs-health fix-links` for suggestions)");
  });

  test("omits the trend when there is no history", () => {
    const { report } = buildReport(sampleCorpus);
    expect(renderMarkdown(report).split("\n").some((line) => line.startsWith("Trend:"))).toBe(
      false,
    );
  });
});

describe("renderCsv", () => {
  test("writes one quoted row per document", () => {
    const { report } = buildReport(sampleCorpus);
    expect(renderCsv(report)).toBe(
      [
        "path,title,category,tags,quality,readability,word_count,related_count",
        "README.md,,,,Very Poor (2/10),Simple,4,0",
        'docs/a.md,A,guide,"setup,cli",Poor (4/10),Simple,6,0',
        "docs/b.md,B,reference,cli,Very Poor (1/10),Simple,2,0",
        "",
      ].join("\r\n"),
    );
  });

  test("escapes quotes the RFC 4180 way", () => {
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField("plain")).toBe("plain");
  });
});

describe("renderDot", () => {
  test("emits one node per document and one edge per internal reference", () => {
    const { graph } = buildReport(sampleCorpus);
    expect(renderDot(graph)).toBe(
      [
        "digraph DocumentRelationships {",
        "  graph [rankdir=LR];",
        "  node [shape=box, style=filled, fillcolor=lightblue];",
        '  "README.md";',
        '  "docs/a.md";',
        '  "docs/b.md";',
        '  "README.md" -> "docs/a.md";',
        '  "docs/a.md" -> "docs/b.md";',
        "}",
        "",
      ].join("\n"),
    );
  });

  test("keeps repeated references to the same document as separate edges", () => {
    const { graph } = buildReport([
      { path: "README.md", content: "# Home\n[one](docs/a.md) [two](docs/a.md#usage)" },
      { path: "docs/a.md", content: "# A" },
    ]);
    const edges = renderDot(graph)
      .split("\n")
      .filter((line) => line.includes("->"));
    expect(edges).toEqual([
      '  "README.md" -> "docs/a.md";',
      '  "README.md" -> "docs/a.md";',
    ]);
  });
});

describe("renderText", () => {
  test("prints the headline numbers", () => {
    const { report } = buildReport(sampleCorpus);
    const lines = renderText(report).split("\n");
    expect(lines[0]).toBe("Documents: 3 (whole corpus)");
    expect(lines).toContain("Health score: 59/100 (Fair)");
    expect(lines).toContain("- [medium] Fix frontmatter in 2 documents");
  });
});
