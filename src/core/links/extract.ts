import type { MarkdownOutline } from "../markdown/outline";
import type { ReferenceOrigin } from "../types";

const MARKDOWN_LINK =
  /!?\[[^\]]*\]\(\s*(<[^>]*>|[^)\s]+)(?:\s+(?:"[^"]*"|'[^']*'))?\s*\)/g;
const INLINE_CODE = /`[^`\n]*`/g;

/**
 * Collects inline link and image targets from prose lines. Inline code spans are ignored.
 */
export function extractLinkTargets(lines: readonly string[]): string[] {
  const targets: string[] = [];
  for (const line of lines) {
    const prose = line.replace(INLINE_CODE, "");
    for (const match of prose.matchAll(MARKDOWN_LINK)) {
      const raw = match[1] ?? "";
      const target = raw.startsWith("<") ? raw.slice(1, -1).trim() : raw;
      if (target) targets.push(target);
    }
  }
  return targets;
}

/**
 * Every reference a document declares: body links first, then `related` front-matter entries.
 */
export function collectReferences(
  outline: MarkdownOutline,
  related: readonly string[] | undefined,
): Array<{ target: string; origin: ReferenceOrigin }> {
  const references: Array<{ target: string; origin: ReferenceOrigin }> =
    extractLinkTargets(outline.proseLines).map((target) => ({
      target,
      origin: "body",
    }));
  for (const target of related ?? []) {
    references.push({ target, origin: "related" });
  }
  return references;
}
