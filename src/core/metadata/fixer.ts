import { posix } from "node:path";
import { outlineMarkdown } from "../markdown/outline";
import type { FrontmatterField } from "../types";
import { extractFrontmatter, splitFrontmatter } from "./frontmatter";
import { validateFrontmatter } from "./validation";

export interface FrontmatterPatch {
  /** Fields written to the block, in required-field order. */
  added: FrontmatterField[];
  /** Required fields still without a value after the patch. */
  remaining: FrontmatterField[];
  content: string;
}

const FIELD_KEY = /^([A-Za-z_][\w-]*)\s*:/;
const PLAIN_SAFE = /^[A-Za-z0-9][^:#"'[\]{}]*$/;

/**
 * `getting-started.md` becomes `Getting Started`.
 */
export function titleFromFilename(path: string): string {
  return posix
    .basename(path, ".md")
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function yamlScalar(value: string): string {
  return PLAIN_SAFE.test(value) ? value : JSON.stringify(value);
}

function derivedValues(
  path: string,
  body: string,
  today: string,
): Partial<Record<FrontmatterField, string>> {
  const outline = outlineMarkdown(body);
  const heading = outline.headings.find((candidate) => candidate.level === 1);

  let description = "";
  if (heading) {
    for (const line of outline.proseLines.slice(heading.line + 1)) {
      const text = line.trim();
      if (!text) {
        if (description) break;
        continue;
      }
      if (text.startsWith("#")) break;
      description = description ? `${description} ${text}` : text;
    }
  }

  const name = posix.basename(path, ".md").replace(/[-_]+/g, " ");
  return {
    title: heading?.text.trim() || titleFromFilename(path),
    description: description || `Description of ${name}`,
    last_updated: today,
  };
}

/**
 * Adds the required fields that have no key in the front-matter and whose value can be derived:
 * `title` from the first `# ` heading or the file name, `description` from the paragraph under
 * that heading, and `last_updated` from `today`. A document without front-matter gets a new
 * block. Keys that exist with an empty or malformed value are never rewritten.
 */
export function planFrontmatterFix(
  path: string,
  content: string,
  requiredFields: readonly FrontmatterField[],
  today: string,
): FrontmatterPatch {
  const extraction = extractFrontmatter(content);
  const { missing } = validateFrontmatter(extraction, requiredFields);
  const block = splitFrontmatter(content);

  const keys = new Set<string>();
  for (const line of block?.lines ?? []) {
    const key = line.match(FIELD_KEY)?.[1];
    if (key) keys.add(key);
  }

  const values = derivedValues(path, extraction.body, today);
  const added: FrontmatterField[] = [];
  const fieldLines: string[] = [];
  for (const field of missing) {
    const value = values[field];
    if (value === undefined || keys.has(field)) continue;
    added.push(field);
    fieldLines.push(`${field}: ${yamlScalar(value)}`);
  }
  const remaining = missing.filter((field) => !added.includes(field));
  if (added.length === 0) return { added, remaining, content };

  const newline = content.includes("\r\n") ? "\r\n" : "\n";
  if (!block) {
    return {
      added,
      remaining,
      content: ["---", ...fieldLines, "---", content].join(newline),
    };
  }
  const lines = content.split(/\r?\n/);
  lines.splice(block.lines.length + 1, 0, ...fieldLines);
  return { added, remaining, content: lines.join(newline) };
}
