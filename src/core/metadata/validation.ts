import type {
  FrontmatterExtraction,
  FrontmatterField,
  FrontmatterRecord,
  FrontmatterStatus,
} from "../types";

export interface FrontmatterValidation {
  status: FrontmatterStatus;
  missing: FrontmatterField[];
  degraded: FrontmatterField[];
}

/**
 * Classifies an extraction as absent, incomplete or complete against the required field list.
 * Degraded fields count as missing.
 */
export function validateFrontmatter(
  extraction: FrontmatterExtraction,
  requiredFields: readonly FrontmatterField[],
): FrontmatterValidation {
  if (extraction.status === "absent") {
    return { status: "absent", missing: [...requiredFields], degraded: [] };
  }
  const missing = requiredFields.filter(
    (field) => !hasValue(extraction.record, field),
  );
  const degraded = [...extraction.degraded];
  return {
    status: missing.length === 0 && degraded.length === 0 ? "complete" : "incomplete",
    missing,
    degraded,
  };
}

function hasValue(record: FrontmatterRecord, field: FrontmatterField): boolean {
  switch (field) {
    case "title":
      return Boolean(record.title);
    case "description":
      return Boolean(record.description);
    case "category":
      return record.category !== undefined;
    case "tags":
      return (record.tags?.length ?? 0) > 0;
    case "related":
      return (record.related?.length ?? 0) > 0;
    case "last_updated":
      return record.lastUpdated !== undefined;
  }
}
