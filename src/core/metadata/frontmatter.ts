import { parse as yamlParse } from "yaml";
import {
  DOCUMENT_CATEGORIES,
  type DocumentCategory,
  type FrontmatterExtraction,
  type FrontmatterField,
  type FrontmatterRecord,
} from "../types";

export type FrontmatterBlock = {
  /** Lines between the fences, without the fences themselves. */
  lines: string[];
  body: string;
};

const FIELD_LINE = /^([A-Za-z_][\w-]*)\s*:(.*)$/;
const LIST_ITEM = /^\s*-\s?(.*)$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const BLOCK_SCALAR = /^[|>][+-]?\d*$/;
const COMMENT = /(?:^|\s)#/;

type ScalarResult = { ok: true; value: string } | { ok: false };
type ListResult = { ok: true; value: string[] } | { ok: false };

/**
 * Splits the leading `---` fenced block from a markdown document.
 *
 * Returns `null` when the first line is not a fence or no closing fence exists; the body is then
 * the whole document.
 */
export function splitFrontmatter(content: string): FrontmatterBlock | null {
  const lines = content.split(/\r?\n/);
  if (lines[0]?.trim() !== "---") return null;

  let closingIndex = -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i]?.trim() === "---") {
      closingIndex = i;
      break;
    }
  }
  if (closingIndex === -1) return null;

  return {
    lines: lines.slice(1, closingIndex),
    body: lines.slice(closingIndex + 1).join("\n"),
  };
}

/**
 * Parses the front-matter of a markdown document into a typed record.
 *
 * Fields are located line by line and each value is parsed on its own, so one malformed field
 * only marks that field as degraded. Never throws.
 */
export function extractFrontmatter(content: string): FrontmatterExtraction {
  const block = splitFrontmatter(content);
  if (!block) return { status: "absent", body: content };

  const raw = collectFields(block.lines);
  const record: FrontmatterRecord = {};
  const degraded: FrontmatterField[] = [];

  const markDegraded = (field: FrontmatterField) => {
    if (!degraded.includes(field)) degraded.push(field);
  };

  for (const field of ["title", "description"] as const) {
    const entry = raw.get(field);
    if (!entry) continue;
    const parsed = parseScalar(entry.inline);
    if (!parsed.ok || entry.items.length > 0) {
      markDegraded(field);
      continue;
    }
    if (parsed.value) record[field] = parsed.value;
  }

  const category = raw.get("category");
  if (category) {
    const parsed = parseScalar(category.inline);
    const normalized = parsed.ok ? normalizeCategory(parsed.value) : null;
    if (normalized) record.category = normalized;
    else markDegraded("category");
  }

  const lastUpdated = raw.get("last_updated");
  if (lastUpdated) {
    const parsed = parseScalar(lastUpdated.inline);
    if (parsed.ok && isIsoDate(parsed.value)) record.lastUpdated = parsed.value;
    else markDegraded("last_updated");
  }

  for (const field of ["tags", "related"] as const) {
    const entry = raw.get(field);
    if (!entry) continue;
    const parsed = parseList(entry.inline, entry.items);
    if (parsed.ok) record[field] = unique(parsed.value);
    else markDegraded(field);
  }

  return { status: "present", record, degraded, body: block.body };
}

type RawField = { inline: string; items: string[] };

function collectFields(lines: string[]): Map<FrontmatterField, RawField> {
  const fields = new Map<FrontmatterField, RawField>();
  let current: RawField | null = null;
  for (const line of lines) {
    const fieldMatch = line.match(FIELD_LINE);
    if (fieldMatch) {
      const [, key = "", rest = ""] = fieldMatch;
      current = null;
      if (isRecognizedField(key) && !fields.has(key)) {
        current = { inline: rest.trim(), items: [] };
        fields.set(key, current);
      }
      continue;
    }
    if (!current) continue;
    const itemMatch = line.match(LIST_ITEM);
    if (itemMatch) current.items.push((itemMatch[1] ?? "").trim());
  }
  return fields;
}

function isRecognizedField(key: string): key is FrontmatterField {
  return (
    key === "title" ||
    key === "description" ||
    key === "category" ||
    key === "tags" ||
    key === "related" ||
    key === "last_updated"
  );
}

/**
 * Plain values are taken up to a ` #` comment; quoted values go through the YAML parser so
 * escapes behave the way YAML defines them. Block scalars (`|`, `>`) are not supported and
 * degrade the field.
 */
function parseScalar(text: string): ScalarResult {
  const trimmed = text.trim();
  if (BLOCK_SCALAR.test(trimmed)) return { ok: false };
  if (!trimmed.startsWith('"') && !trimmed.startsWith("'")) {
    const comment = trimmed.search(COMMENT);
    return {
      ok: true,
      value: comment === -1 ? trimmed : trimmed.slice(0, comment).trim(),
    };
  }
  try {
    const value: unknown = yamlParse(trimmed);
    if (typeof value === "string") return { ok: true, value: value.trim() };
    return { ok: false };
  } catch {
    return { ok: false };
  }
}

function parseList(inline: string, items: string[]): ListResult {
  if (inline.startsWith("[")) {
    if (items.length > 0) return { ok: false };
    try {
      const value: unknown = yamlParse(inline);
      if (!Array.isArray(value)) return { ok: false };
      const entries: string[] = [];
      for (const entry of value) {
        if (typeof entry === "string" || typeof entry === "number") {
          const text = String(entry).trim();
          if (text) entries.push(text);
        } else if (entry !== null) {
          return { ok: false };
        }
      }
      return { ok: true, value: entries };
    } catch {
      return { ok: false };
    }
  }

  const values: string[] = [];
  if (inline) {
    const single = parseScalar(inline);
    if (!single.ok || items.length > 0) return { ok: false };
    values.push(single.value);
  }
  for (const item of items) {
    const parsed = parseScalar(item);
    if (!parsed.ok) return { ok: false };
    if (parsed.value) values.push(parsed.value);
  }
  return { ok: true, value: values };
}

/**
 * Maps free-form category values onto the closed enumeration. `Guides` and `getting started`
 * are accepted as `guide` and `getting-started`.
 */
export function normalizeCategory(value: string): DocumentCategory | null {
  const normalized = value.trim().toLowerCase().replace(/[\s_]+/g, "-");
  const singular = normalized.endsWith("s")
    ? normalized.slice(0, -1)
    : normalized;
  for (const category of DOCUMENT_CATEGORIES) {
    if (category === normalized || category === singular) return category;
  }
  return null;
}

function isIsoDate(value: string): boolean {
  const match = value.match(ISO_DATE);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
