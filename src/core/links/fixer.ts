import { posix } from "node:path";
import { outlineMarkdown } from "../markdown/outline";
import { splitFrontmatter } from "../metadata/frontmatter";
import type { BrokenEdge, DocumentGraph } from "../types";
import { toRootedReference } from "./resolver";

export interface LinkFix {
  source: string;
  /** Reference exactly as written in the source document. */
  target: string;
  replacement: string;
  /** Scanned document the replacement points at. */
  document: string;
}

export interface LinkFixPlan {
  fixes: LinkFix[];
  unfixable: BrokenEdge[];
}

const FIELD_KEY = /^([A-Za-z_][\w-]*)\s*:/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function splitSuffix(reference: string): { path: string; suffix: string } {
  const cut = reference.search(/[?#]/);
  if (cut === -1) return { path: reference, suffix: "" };
  return { path: reference.slice(0, cut), suffix: reference.slice(cut) };
}

function safeDecode(value: string): string {
  try {
    return decodeURI(value);
  } catch {
    return value;
  }
}

/**
 * Proposes a replacement for every broken edge whose file name matches a scanned document.
 * The first match in sorted order wins. Targets inside the corpus directory become rooted
 * references; anything else becomes a path relative to the source document.
 */
export function suggestLinkFixes(
  graph: DocumentGraph,
  docsDir: string,
): LinkFixPlan {
  const byBasename = new Map<string, string>();
  for (const node of graph.nodes) {
    const name = posix.basename(node).toLowerCase();
    if (!byBasename.has(name)) byBasename.set(name, node);
  }

  const fixes: LinkFix[] = [];
  const unfixable: BrokenEdge[] = [];
  const seen = new Set<string>();
  for (const edge of graph.broken) {
    const key = `${edge.source}\u0000${edge.target}`;
    if (seen.has(key)) continue;
    seen.add(key);

    const { path, suffix } = splitSuffix(edge.target);
    const name = posix.basename(safeDecode(path)).toLowerCase();
    const document = byBasename.get(name);
    if (!name || !document || document === edge.source) {
      unfixable.push(edge);
      continue;
    }
    const replacement = document.startsWith(`${docsDir}/`)
      ? toRootedReference(document, docsDir)
      : posix.relative(posix.dirname(edge.source), document);
    fixes.push({
      source: edge.source,
      target: edge.target,
      replacement: `${replacement}${suffix}`,
      document,
    });
  }
  return { fixes, unfixable };
}

/**
 * Rewrites body links and `related` entries of one document. Fenced code is left untouched.
 */
export function applyLinkFixes(
  content: string,
  fixes: ReadonlyArray<Pick<LinkFix, "target" | "replacement">>,
): { content: string; replaced: number } {
  const newline = content.includes("\r\n") ? "\r\n" : "\n";
  const lines = content.split(/\r?\n/);
  const block = splitFrontmatter(content);
  const bodyStart = block ? block.lines.length + 2 : 0;
  let replaced = 0;

  if (block) {
    let field: string | null = null;
    for (let index = 1; index < bodyStart - 1; index++) {
      const line = lines[index] ?? "";
      const key = line.match(FIELD_KEY);
      if (key) field = key[1] ?? null;
      if (field !== "related") continue;
      let updated = line;
      for (const fix of fixes) {
        const pattern = new RegExp(
          `(^|[\\s\\[,"'])${escapeRegExp(fix.target)}(?=$|[\\s\\],"'])`,
          "g",
        );
        updated = updated.replace(pattern, (_match, lead: string) => {
          replaced += 1;
          return `${lead}${fix.replacement}`;
        });
      }
      lines[index] = updated;
    }
  }

  const outline = outlineMarkdown(lines.slice(bodyStart).join("\n"));
  outline.proseLines.forEach((prose, offset) => {
    const index = bodyStart + offset;
    const line = lines[index] ?? "";
    if (prose !== line) return;
    let updated = line;
    for (const fix of fixes) {
      const pattern = new RegExp(
        `\\]\\(\\s*(<?)${escapeRegExp(fix.target)}(>?)(?=\\s|\\))`,
        "g",
      );
      updated = updated.replace(
        pattern,
        (_match, open: string, close: string) => {
          replaced += 1;
          return `](${open}${fix.replacement}${close}`;
        },
      );
    }
    lines[index] = updated;
  });

  return { content: lines.join(newline), replaced };
}
