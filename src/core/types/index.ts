/**
 * Log verbosity levels supported by the CLI modules.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Closed set of document categories accepted in front-matter.
 */
export const DOCUMENT_CATEGORIES = [
  "getting-started",
  "guide",
  "reference",
  "contributing",
  "roadmap",
  "architecture",
  "example",
  "misc",
  "documentation",
] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

/**
 * Front-matter fields the extractor recognises, keyed by their YAML names.
 */
export type FrontmatterField =
  | "title"
  | "description"
  | "category"
  | "tags"
  | "related"
  | "last_updated";

/**
 * Typed view of a document's front-matter block. Every field may be missing inside a present block.
 */
export interface FrontmatterRecord {
  title?: string;
  description?: string;
  category?: DocumentCategory;
  tags?: string[];
  related?: string[];
  lastUpdated?: string;
}

export type FrontmatterExtraction =
  | { status: "absent"; body: string }
  | {
      status: "present";
      record: FrontmatterRecord;
      /** Fields that were declared but held an unparseable value. */
      degraded: FrontmatterField[];
      body: string;
    };

export type FrontmatterStatus = "absent" | "incomplete" | "complete";

export interface FrontmatterIssue {
  path: string;
  status: Exclude<FrontmatterStatus, "complete">;
  missing: FrontmatterField[];
  degraded: FrontmatterField[];
}

/**
 * A markdown document read from the corpus. Immutable for the duration of a run.
 */
export interface DocumentInput {
  /** Posix path relative to the project root, e.g. `docs/guides/setup.md`. */
  path: string;
  content: string;
}

export type ReferenceKind =
  | "relative"
  | "dot-relative"
  | "rooted"
  | "external"
  | "anchor-only";

export type InternalReferenceKind = Exclude<
  ReferenceKind,
  "external" | "anchor-only"
>;

export interface ResolvedReference {
  kind: ReferenceKind;
  /** Canonical project-relative path, `null` for external and anchor-only references. */
  resolved: string | null;
  exists: boolean;
}

/**
 * Where a reference was declared in its source document.
 */
export type ReferenceOrigin = "body" | "related";

export interface ReferenceEdge {
  source: string;
  target: string;
  origin: ReferenceOrigin;
  kind: ReferenceKind;
  resolved: string | null;
  exists: boolean;
}

export type BrokenReason = "missing" | "unresolvable";

export interface BrokenEdge extends ReferenceEdge {
  kind: InternalReferenceKind;
  resolved: string;
  reason: BrokenReason;
}

export interface DocumentGraph {
  nodes: string[];
  /** Internal edges only; external and anchor-only references are excluded. */
  edges: ReferenceEdge[];
  adjacency: Map<string, Set<string>>;
  reverse: Map<string, Set<string>>;
  orphans: string[];
  broken: BrokenEdge[];
  /** Count of every extracted reference by kind, internal or not. */
  referenceCounts: Record<ReferenceKind, number>;
}

export type QualityLabel =
  | "Excellent"
  | "Good"
  | "Adequate"
  | "Poor"
  | "Very Poor";

export interface QualityChecks {
  hasTitle: boolean;
  hasDescription: boolean;
  hasTopHeading: boolean;
  hasSubheading: boolean;
  hasMultipleSubheadings: boolean;
  hasCodeBlock: boolean;
  hasCodeLanguage: boolean;
  hasInternalLink: boolean;
  hasRelatedSection: boolean;
  hasRelatedLinks: boolean;
}

export interface QualityRecord {
  score: number;
  maxScore: number;
  label: QualityLabel;
  checks: QualityChecks;
}

export type ReadabilityLabel = "Simple" | "Good" | "Complex";

export interface ReadabilityRecord {
  words: number;
  sentences: number;
  wordsPerSentence: number;
  label: ReadabilityLabel;
}

/**
 * Everything learnt about one document during the parallel analysis stage.
 */
export interface DocumentAnalysis {
  path: string;
  frontmatter: FrontmatterExtraction;
  frontmatterStatus: FrontmatterStatus;
  missingFields: FrontmatterField[];
  references: Array<{ target: string; origin: ReferenceOrigin }>;
  quality: QualityRecord;
  readability: ReadabilityRecord;
}

export type ScanScope =
  | { kind: "corpus"; recursive: boolean }
  | { kind: "directory"; path: string; recursive: boolean }
  | { kind: "file"; path: string };

export type HealthRating = "Excellent" | "Good" | "Fair" | "Poor";

export type RecommendationPriority = "high" | "medium" | "low";

export type IssueCategory =
  | "broken-links"
  | "low-quality"
  | "frontmatter"
  | "complex-readability"
  | "orphans"
  | "linting";

export interface Recommendation {
  category: IssueCategory;
  priority: RecommendationPriority;
  count: number;
  message: string;
}

export interface DocumentSummary {
  path: string;
  title: string | null;
  category: DocumentCategory | null;
  tags: readonly string[];
  relatedCount: number;
  frontmatterStatus: FrontmatterStatus;
  quality: QualityRecord;
  readability: ReadabilityRecord;
}

export interface DocumentAdvice {
  path: string;
  items: readonly string[];
}

export interface ReportInventory {
  totalDocuments: number;
  withFrontmatter: number;
  completeFrontmatter: number;
  incompleteFrontmatter: number;
  missingFrontmatter: number;
  /** Percentage of documents whose front-matter is complete. */
  frontmatterCoverage: number;
  references: Readonly<Record<ReferenceKind, number>>;
}

export interface Report {
  generatedAt: string;
  scope: ScanScope;
  inventory: ReportInventory;
  categories: ReadonlyArray<{ category: string; count: number }>;
  tags: ReadonlyArray<{ tag: string; count: number }>;
  orphans: readonly string[];
  /** Documents no README entry point reaches; empty when the scan holds no README. */
  unreachable: readonly string[];
  brokenEdges: readonly BrokenEdge[];
  frontmatterIssues: readonly FrontmatterIssue[];
  documents: readonly DocumentSummary[];
  qualityDistribution: Readonly<Record<QualityLabel, number>>;
  readabilityDistribution: Readonly<Record<ReadabilityLabel, number>>;
  averageWordsPerSentence: number;
  lintingIssues: number;
  healthScore: number;
  healthRating: HealthRating;
  recommendations: readonly Recommendation[];
  advice: readonly DocumentAdvice[];
}

export interface HistoryRow {
  date: string;
  totalDocs: number;
  healthScore: number;
  brokenLinks: number;
  frontmatterIssues: number;
  excellent: number;
  good: number;
  adequate: number;
  poor: number;
  veryPoor: number;
}

/**
 * File system locations used by the engine.
 */
export interface PathConfiguration {
  /** Project root every document path is relative to. */
  root: string;
  /** Corpus directory below the root; rooted references `/docs/...` resolve into it. */
  docs: string;
  reports: string;
  history: string;
  log_level: LogLevel;
}

export interface AnalysisConfiguration {
  concurrency: number;
  recursive: boolean;
  timeout_ms: number;
}

export interface FrontmatterConfiguration {
  required_fields: FrontmatterField[];
}

export interface ReportConfiguration {
  ci_threshold: number;
  top_tags: number;
}

/**
 * Complete configuration schema loaded from docs-health.config.yaml.
 */
export interface GlobalConfig {
  version: number;
  paths: PathConfiguration;
  analysis: AnalysisConfiguration;
  frontmatter: FrontmatterConfiguration;
  report: ReportConfiguration;
}
