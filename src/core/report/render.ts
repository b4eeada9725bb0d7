import type { TrendSummary } from "../history";
import type {
  DocumentGraph,
  QualityLabel,
  ReadabilityLabel,
  Report,
  ScanScope,
} from "../types";

const QUALITY_ORDER: readonly QualityLabel[] = [
  "Excellent",
  "Good",
  "Adequate",
  "Poor",
  "Very Poor",
];
const READABILITY_ORDER: readonly ReadabilityLabel[] = [
  "Simple",
  "Good",
  "Complex",
];

export const CSV_HEADER =
  "path,title,category,tags,quality,readability,word_count,related_count";

export function describeScope(scope: ScanScope): string {
  switch (scope.kind) {
    case "corpus":
      return scope.recursive ? "whole corpus" : "corpus (top level only)";
    case "directory":
      return scope.recursive
        ? `directory ${scope.path}`
        : `directory ${scope.path} (top level only)`;
    case "file":
      return `file ${scope.path}`;
  }
}

function cell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function table(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string[] {
  return [
    `| ${header.join(" | ")} |`,
    `| ${header.map(() => "---").join(" | ")} |`,
    ...rows.map((row) => `| ${row.map(cell).join(" | ")} |`),
  ];
}

export function formatTrend(trend: TrendSummary): string {
  const sign = trend.delta > 0 ? "+" : "";
  return `${sign}${trend.delta} since ${trend.previousDate} (was ${trend.previousScore})`;
}

/**
 * Markdown rendering with a fixed section order. Empty sections still render with a
 * placeholder line so reports stay diffable between runs.
 */
export function renderMarkdown(
  report: Report,
  trend: TrendSummary | null = null,
): string {
  const { inventory } = report;
  const refs = inventory.references;
  const lines: string[] = [
    "# Documentation Health Report",
    "",
    `Generated: ${report.generatedAt}`,
    `Scope: ${describeScope(report.scope)}`,
    "",
    "## Inventory",
    "",
    ...table(
      ["Metric", "Value"],
      [
        ["Total documents", String(inventory.totalDocuments)],
        ["With frontmatter", String(inventory.withFrontmatter)],
        ["Complete frontmatter", String(inventory.completeFrontmatter)],
        ["Incomplete frontmatter", String(inventory.incompleteFrontmatter)],
        ["Missing frontmatter", String(inventory.missingFrontmatter)],
        ["Frontmatter coverage", `${inventory.frontmatterCoverage}%`],
        [
          "Internal references",
          String(refs.relative + refs["dot-relative"] + refs.rooted),
        ],
        ["External references", String(refs.external)],
        ["Anchor references", String(refs["anchor-only"])],
      ],
    ),
    "",
    "## Category Distribution",
    "",
  ];

  if (report.categories.length === 0) {
    lines.push("_No categories declared._");
  } else {
    lines.push(
      ...table(
        ["Category", "Documents"],
        report.categories.map((entry) => [entry.category, String(entry.count)]),
      ),
    );
  }

  lines.push("", "## Tag Usage", "");
  if (report.tags.length === 0) {
    lines.push("_No tags declared._");
  } else {
    lines.push(
      ...table(
        ["Tag", "Documents"],
        report.tags.map((entry) => [entry.tag, String(entry.count)]),
      ),
    );
  }

  lines.push("", "## Relationships", "", "### Orphaned Documents", "");
  if (report.orphans.length === 0) {
    lines.push("_None._");
  } else {
    lines.push(...report.orphans.map((path) => `- \`${path}\``));
  }

  lines.push("", "### Broken References", "");
  if (report.brokenEdges.length === 0) {
    lines.push("_None._");
  } else {
    lines.push(
      ...table(
        ["Source", "Target", "Resolved", "Reason"],
        report.brokenEdges.map((edge) => [
          edge.source,
          edge.target,
          edge.resolved,
          edge.reason,
        ]),
      ),
    );
  }

  if (report.unreachable.length > 0) {
    lines.push(
      "",
      "### Unreachable From README",
      "",
      ...report.unreachable.map((path) => `- \`${path}\``),
    );
  }

  lines.push(
    "",
    "## Content Quality",
    "",
    ...table(
      ["Label", "Documents"],
      QUALITY_ORDER.map((label) => [
        label,
        String(report.qualityDistribution[label]),
      ]),
    ),
    "",
    ...table(
      ["Document", "Score", "Label"],
      report.documents.map((document) => [
        document.path,
        `${document.quality.score}/${document.quality.maxScore}`,
        document.quality.label,
      ]),
    ),
    "",
    "## Readability",
    "",
    `Average words per sentence: ${report.averageWordsPerSentence}`,
    "",
    ...table(
      ["Label", "Documents"],
      READABILITY_ORDER.map((label) => [
        label,
        String(report.readabilityDistribution[label]),
      ]),
    ),
    "",
    ...table(
      ["Document", "Words", "Words/Sentence", "Label"],
      report.documents.map((document) => [
        document.path,
        String(document.readability.words),
        String(document.readability.wordsPerSentence),
        document.readability.label,
      ]),
    ),
    "",
    "## Recommendations",
    "",
  );

  if (report.recommendations.length === 0) {
    lines.push("_No issues found._");
  } else {
    report.recommendations.forEach((recommendation, index) => {
      lines.push(
        `${index + 1}. **[${recommendation.priority}]** ${recommendation.message}`,
      );
    });
  }

  if (report.advice.length > 0) {
    lines.push("", "### Document Advice");
    for (const entry of report.advice) {
      lines.push("", `#### \`${entry.path}\``, "");
      lines.push(...entry.items.map((item) => `- ${item}`));
    }
  }

  lines.push(
    "",
    "## Summary",
    "",
    `Health score: **${report.healthScore}/100** (${report.healthRating})`,
  );
  if (trend) lines.push(`Trend: ${formatTrend(trend)}`);
  lines.push("");
  return lines.join("\n");
}

/**
 * RFC 4180 field: quoted only when it holds a comma, quote or line break.
 */
export function csvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function renderCsv(report: Report): string {
  const rows = report.documents.map((document) =>
    [
      document.path,
      document.title ?? "",
      document.category ?? "",
      document.tags.join(","),
      `${document.quality.label} (${document.quality.score}/${document.quality.maxScore})`,
      document.readability.label,
      String(document.readability.words),
      String(document.relatedCount),
    ]
      .map(csvField)
      .join(","),
  );
  return `${[CSV_HEADER, ...rows].join("\r\n")}\r\n`;
}

function dotId(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Graphviz rendering: one node per document and one edge per internal reference between
 * documents, so a target referenced twice gets two edges. References to files outside the
 * scanned set are left out.
 */
export function renderDot(graph: DocumentGraph): string {
  const nodes = new Set(graph.nodes);
  const lines = [
    "digraph DocumentRelationships {",
    "  graph [rankdir=LR];",
    "  node [shape=box, style=filled, fillcolor=lightblue];",
  ];
  for (const node of graph.nodes) {
    lines.push(`  ${dotId(node)};`);
  }
  for (const edge of graph.edges) {
    if (edge.resolved === null || !nodes.has(edge.resolved)) continue;
    lines.push(`  ${dotId(edge.source)} -> ${dotId(edge.resolved)};`);
  }
  lines.push("}");
  return `${lines.join("\n")}\n`;
}

/**
 * Short terminal summary used by the `text` format.
 */
export function renderText(
  report: Report,
  trend: TrendSummary | null = null,
): string {
  const lines = [
    `Documents: ${report.inventory.totalDocuments} (${describeScope(report.scope)})`,
    `Frontmatter coverage: ${report.inventory.frontmatterCoverage}%`,
    `Broken references: ${report.brokenEdges.length}`,
    `Orphaned documents: ${report.orphans.length}`,
    `Quality: ${QUALITY_ORDER.map((label) => `${label} ${report.qualityDistribution[label]}`).join(", ")}`,
    `Readability: ${READABILITY_ORDER.map((label) => `${label} ${report.readabilityDistribution[label]}`).join(", ")}`,
    `Health score: ${report.healthScore}/100 (${report.healthRating})`,
  ];
  if (trend) lines.push(`Trend: ${formatTrend(trend)}`);
  for (const recommendation of report.recommendations) {
    lines.push(`- [${recommendation.priority}] ${recommendation.message}`);
  }
  return `${lines.join("\n")}\n`;
}
