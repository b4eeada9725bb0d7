import { collectReferences } from "../links/extract";
import { outlineMarkdown } from "../markdown/outline";
import { extractFrontmatter } from "../metadata/frontmatter";
import { validateFrontmatter } from "../metadata/validation";
import { analyzeReadability } from "../quality/readability";
import { scoreQuality } from "../quality/scorer";
import type { DocumentAnalysis, DocumentInput, FrontmatterField } from "../types";

/**
 * Runs every per-document stage. Pure and independent of other documents, so callers may run
 * it for many documents concurrently.
 */
export function analyzeDocument(
  document: DocumentInput,
  requiredFields: readonly FrontmatterField[],
): DocumentAnalysis {
  const frontmatter = extractFrontmatter(document.content);
  const record = frontmatter.status === "present" ? frontmatter.record : null;
  const validation = validateFrontmatter(frontmatter, requiredFields);
  const outline = outlineMarkdown(frontmatter.body);

  return {
    path: document.path,
    frontmatter,
    frontmatterStatus: validation.status,
    missingFields: validation.missing,
    references: collectReferences(outline, record?.related),
    quality: scoreQuality({ frontmatter: record, outline }),
    readability: analyzeReadability(outline.proseLines),
  };
}
