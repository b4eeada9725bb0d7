import { classifyReference } from "../links/resolver";
import { extractLinkTargets } from "../links/extract";
import { sectionLines, type MarkdownOutline } from "../markdown/outline";
import type {
  FrontmatterRecord,
  QualityChecks,
  QualityLabel,
  QualityRecord,
} from "../types";

export const MAX_QUALITY_SCORE = 10;
export const RELATED_SECTION_TITLE = "Related Documents";

export interface QualityInput {
  frontmatter: FrontmatterRecord | null;
  outline: MarkdownOutline;
}

/**
 * Scores the structural completeness of one document on a 0–10 rubric.
 *
 * One point each for: title, description, a `#` heading, a `##` heading, a second `##` heading,
 * a fenced code block, a language on that block, an internal `.md` link, a
 * `## Related Documents` heading, and a link inside that section. The language and section-link
 * points are only available when the element they qualify exists.
 */
export function scoreQuality(input: QualityInput): QualityRecord {
  const { frontmatter, outline } = input;
  const subheadings = outline.headings.filter((heading) => heading.level === 2);
  const relatedSection = sectionLines(outline, 2, RELATED_SECTION_TITLE);
  const hasCodeBlock = outline.codeBlocks.length > 0;
  const hasRelatedSection = relatedSection !== null;

  const checks: QualityChecks = {
    hasTitle: Boolean(frontmatter?.title),
    hasDescription: Boolean(frontmatter?.description),
    hasTopHeading: outline.headings.some((heading) => heading.level === 1),
    hasSubheading: subheadings.length >= 1,
    hasMultipleSubheadings: subheadings.length >= 2,
    hasCodeBlock,
    hasCodeLanguage:
      hasCodeBlock && outline.codeBlocks.some((block) => block.language !== null),
    hasInternalLink: extractLinkTargets(outline.proseLines).some(
      isInternalDocumentLink,
    ),
    hasRelatedSection,
    hasRelatedLinks:
      hasRelatedSection && extractLinkTargets(relatedSection).length > 0,
  };

  const score = Object.values(checks).filter(Boolean).length;
  return {
    score,
    maxScore: MAX_QUALITY_SCORE,
    label: qualityLabel(score),
    checks,
  };
}

/**
 * Buckets are contiguous and ordered, so a higher score never maps to a lower label.
 */
export function qualityLabel(score: number): QualityLabel {
  if (score >= 9) return "Excellent";
  if (score >= 7) return "Good";
  if (score >= 5) return "Adequate";
  if (score >= 3) return "Poor";
  return "Very Poor";
}

function isInternalDocumentLink(target: string): boolean {
  const kind = classifyReference(target);
  if (kind === "external" || kind === "anchor-only") return false;
  const path = target.split(/[?#]/)[0] ?? "";
  return path.toLowerCase().endsWith(".md");
}
