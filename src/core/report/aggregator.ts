import { comparePaths, isEntryPoint, unreachableDocuments } from "../graph";
import type {
  BrokenEdge,
  DocumentAdvice,
  DocumentAnalysis,
  DocumentGraph,
  DocumentSummary,
  FrontmatterIssue,
  HealthRating,
  QualityLabel,
  ReadabilityLabel,
  Recommendation,
  Report,
  ScanScope,
} from "../types";

export interface AggregateInput {
  scope: ScanScope;
  analyses: readonly DocumentAnalysis[];
  graph: DocumentGraph;
  /** Markdown lint findings counted by an external linter, when one ran. */
  lintingIssues?: number;
  topTags?: number;
  generatedAt?: Date;
}

export interface HealthInputs {
  totalDocuments: number;
  lintingIssues: number;
  brokenLinks: number;
  frontmatterIssues: number;
  quality: Readonly<Record<QualityLabel, number>>;
  goodReadability: number;
}

/**
 * Corpus health on a 0–100 scale. Starts at 100, every term only subtracts, integer arithmetic
 * throughout, clamped at both ends.
 */
export function computeHealthScore(inputs: HealthInputs): number {
  let score = 100;
  score -= Math.floor(Math.max(0, inputs.lintingIssues) / 2);
  score -= Math.max(0, inputs.brokenLinks) * 5;
  score -= Math.max(0, inputs.frontmatterIssues) * 3;

  const total = inputs.totalDocuments;
  if (total > 0) {
    const weighted =
      inputs.quality.Excellent * 5 +
      inputs.quality.Good * 3 +
      inputs.quality.Adequate;
    const qualityPercent = Math.floor((weighted * 100) / (total * 5));
    score -= Math.floor(Math.max(0, 100 - qualityPercent) / 5);

    const readabilityPercent = Math.floor((inputs.goodReadability * 100) / total);
    score -= Math.floor(Math.max(0, 100 - readabilityPercent) / 10);
  }

  return Math.min(100, Math.max(0, score));
}

export function healthRating(score: number): HealthRating {
  if (score >= 90) return "Excellent";
  if (score >= 70) return "Good";
  if (score >= 50) return "Fair";
  return "Poor";
}

/**
 * Folds per-document results and graph anomalies into one frozen report.
 */
export function aggregateReport(input: AggregateInput): Report {
  const analyses = [...input.analyses].sort((a, b) =>
    comparePaths(a.path, b.path),
  );
  const { graph } = input;
  const total = analyses.length;
  const lintingIssues = Math.max(0, input.lintingIssues ?? 0);

  const qualityDistribution: Record<QualityLabel, number> = {
    Excellent: 0,
    Good: 0,
    Adequate: 0,
    Poor: 0,
    "Very Poor": 0,
  };
  const readabilityDistribution: Record<ReadabilityLabel, number> = {
    Simple: 0,
    Good: 0,
    Complex: 0,
  };
  const categoryCounts = new Map<string, number>();
  const tagCounts = new Map<string, number>();
  const frontmatterIssues: FrontmatterIssue[] = [];
  const documents: DocumentSummary[] = [];
  let wordsPerSentenceSum = 0;

  for (const analysis of analyses) {
    qualityDistribution[analysis.quality.label] += 1;
    readabilityDistribution[analysis.readability.label] += 1;
    wordsPerSentenceSum += analysis.readability.wordsPerSentence;

    const record =
      analysis.frontmatter.status === "present"
        ? analysis.frontmatter.record
        : null;
    if (record?.category) {
      categoryCounts.set(
        record.category,
        (categoryCounts.get(record.category) ?? 0) + 1,
      );
    }
    for (const tag of record?.tags ?? []) {
      tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
    }
    if (analysis.frontmatterStatus !== "complete") {
      frontmatterIssues.push({
        path: analysis.path,
        status: analysis.frontmatterStatus,
        missing: [...analysis.missingFields],
        degraded:
          analysis.frontmatter.status === "present"
            ? [...analysis.frontmatter.degraded]
            : [],
      });
    }

    documents.push({
      path: analysis.path,
      title: record?.title ?? null,
      category: record?.category ?? null,
      tags: [...(record?.tags ?? [])],
      relatedCount: record?.related?.length ?? 0,
      frontmatterStatus: analysis.frontmatterStatus,
      quality: { ...analysis.quality, checks: { ...analysis.quality.checks } },
      readability: { ...analysis.readability },
    });
  }

  const withFrontmatter = analyses.filter(
    (analysis) => analysis.frontmatterStatus !== "absent",
  ).length;
  const completeFrontmatter = analyses.filter(
    (analysis) => analysis.frontmatterStatus === "complete",
  ).length;

  const healthScore = computeHealthScore({
    totalDocuments: total,
    lintingIssues,
    brokenLinks: graph.broken.length,
    frontmatterIssues: frontmatterIssues.length,
    quality: qualityDistribution,
    goodReadability: readabilityDistribution.Good,
  });

  const hasEntryPoint = graph.nodes.some(isEntryPoint);

  const report: Report = {
    generatedAt: (input.generatedAt ?? new Date()).toISOString(),
    scope: { ...input.scope },
    inventory: {
      totalDocuments: total,
      withFrontmatter,
      completeFrontmatter,
      incompleteFrontmatter: withFrontmatter - completeFrontmatter,
      missingFrontmatter: total - withFrontmatter,
      frontmatterCoverage:
        total > 0 ? Math.floor((completeFrontmatter * 100) / total) : 0,
      references: { ...graph.referenceCounts },
    },
    categories: [...categoryCounts.entries()]
      .map(([category, count]) => ({ category, count }))
      .sort((a, b) => comparePaths(a.category, b.category)),
    tags: [...tagCounts.entries()]
      .map(([tag, count]) => ({ tag, count }))
      .sort((a, b) => b.count - a.count || comparePaths(a.tag, b.tag))
      .slice(0, input.topTags ?? 10),
    orphans: [...graph.orphans],
    unreachable: hasEntryPoint ? unreachableDocuments(graph) : [],
    brokenEdges: graph.broken.map((edge) => ({ ...edge })),
    frontmatterIssues,
    documents,
    qualityDistribution,
    readabilityDistribution,
    averageWordsPerSentence:
      total > 0 ? Math.round((wordsPerSentenceSum / total) * 100) / 100 : 0,
    lintingIssues,
    healthScore,
    healthRating: healthRating(healthScore),
    recommendations: buildRecommendations({
      brokenLinks: graph.broken.length,
      frontmatterIssues: frontmatterIssues.length,
      lowQuality: qualityDistribution.Poor + qualityDistribution["Very Poor"],
      complex: readabilityDistribution.Complex,
      orphans: graph.orphans.length,
      lintingIssues,
    }),
    advice: buildAdvice(analyses, graph.broken),
  };
  return deepFreeze(report);
}

interface IssueCounts {
  brokenLinks: number;
  frontmatterIssues: number;
  lowQuality: number;
  complex: number;
  orphans: number;
  lintingIssues: number;
}

/**
 * Fixed templates in a fixed order; a template is emitted only when its count is non-zero.
 */
export function buildRecommendations(counts: IssueCounts): Recommendation[] {
  const recommendations: Recommendation[] = [];
  if (counts.brokenLinks > 0) {
    recommendations.push({
      category: "broken-links",
      priority: "high",
      count: counts.brokenLinks,
      message: `Fix ${plural(counts.brokenLinks, "broken link")} (run \`docs-health fix-links\` for suggestions)`,
    });
  }
  if (counts.frontmatterIssues > 0) {
    recommendations.push({
      category: "frontmatter",
      priority: "medium",
      count: counts.frontmatterIssues,
      message: `Fix frontmatter in ${plural(counts.frontmatterIssues, "document")}`,
    });
  }
  if (counts.lowQuality > 0) {
    recommendations.push({
      category: "low-quality",
      priority: "medium",
      count: counts.lowQuality,
      message: `Improve ${plural(counts.lowQuality, "document")} with poor/very poor quality scores`,
    });
  }
  if (counts.complex > 0) {
    recommendations.push({
      category: "complex-readability",
      priority: "low",
      count: counts.complex,
      message: `Simplify ${plural(counts.complex, "document")} with complex readability`,
    });
  }
  if (counts.orphans > 0) {
    recommendations.push({
      category: "orphans",
      priority: "low",
      count: counts.orphans,
      message: `Link ${plural(counts.orphans, "orphaned document")} from an index or a Related Documents section`,
    });
  }
  if (counts.lintingIssues > 0) {
    recommendations.push({
      category: "linting",
      priority: "low",
      count: counts.lintingIssues,
      message: `Address ${plural(counts.lintingIssues, "markdown linting issue")}`,
    });
  }
  return recommendations;
}

function buildAdvice(
  analyses: readonly DocumentAnalysis[],
  broken: readonly BrokenEdge[],
): DocumentAdvice[] {
  const brokenBySource = new Map<string, BrokenEdge[]>();
  for (const edge of broken) {
    const bucket = brokenBySource.get(edge.source) ?? [];
    bucket.push(edge);
    brokenBySource.set(edge.source, bucket);
  }

  const advice: DocumentAdvice[] = [];
  for (const analysis of analyses) {
    const { quality, readability } = analysis;
    const brokenEdges = brokenBySource.get(analysis.path) ?? [];
    const needsAttention =
      quality.label === "Poor" ||
      quality.label === "Very Poor" ||
      quality.label === "Adequate" ||
      readability.label === "Complex" ||
      brokenEdges.length > 0 ||
      analysis.frontmatterStatus !== "complete";
    if (!needsAttention) continue;

    const items: string[] = [];
    if (analysis.frontmatterStatus === "absent") {
      items.push("Add frontmatter with title, description, category, tags and last_updated.");
    } else if (analysis.frontmatterStatus === "incomplete") {
      const fields = [
        ...analysis.missingFields,
        ...(analysis.frontmatter.status === "present"
          ? analysis.frontmatter.degraded
          : []),
      ];
      items.push(`Complete frontmatter fields: ${[...new Set(fields)].join(", ")}.`);
    }
    if (quality.label === "Poor" || quality.label === "Very Poor") {
      items.push(
        "Structure needs significant improvement. Add proper frontmatter, headings, and sections.",
      );
    } else if (quality.label === "Adequate") {
      items.push(
        "Good basic structure, but needs more detail and better section organization.",
      );
    }
    if (readability.label === "Complex") {
      items.push(
        `Simplify content: break long sentences into shorter ones (currently ${readability.wordsPerSentence} words per sentence).`,
      );
    } else if (readability.label === "Simple") {
      items.push(
        "Content may be too simplistic. Consider adding more detailed explanations.",
      );
    }
    if (!quality.checks.hasRelatedSection) {
      items.push("Add a 'Related Documents' section with relevant links.");
    }
    for (const edge of brokenEdges) {
      items.push(`Fix broken link to ${edge.target}.`);
    }
    advice.push({ path: analysis.path, items });
  }
  return advice;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
