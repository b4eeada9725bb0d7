import { analyzeDocument } from "../src/core/analysis/document";
import { DocsInputError } from "../src/core/errors";
import type { DocumentSource } from "../src/core/fs/docs";
import { buildDocumentGraph } from "../src/core/graph";
import { aggregateReport } from "../src/core/report/aggregator";
import type { DocumentInput, FrontmatterField, ScanScope } from "../src/core/types";

/**
 * In-memory corpus keyed by project path. `extraFiles` exist on "disk" without being documents.
 */
export class MemoryDocumentSource implements DocumentSource {
  readonly reads: string[] = [];
  private readonly files: Map<string, string>;

  constructor(
    files: Record<string, string>,
    private readonly extraFiles: readonly string[] = [],
    private readonly docsDir = "docs",
  ) {
    this.files = new Map(Object.entries(files));
  }

  async list(scope: ScanScope): Promise<string[]> {
    const all = [...this.files.keys()].filter((path) => path.endsWith(".md")).sort();
    if (scope.kind === "file") {
      if (!this.files.has(scope.path)) {
        throw new DocsInputError(`File not found: ${scope.path}`, scope.path);
      }
      return [scope.path];
    }
    const directory = scope.kind === "corpus" ? this.docsDir : scope.path;
    const prefix = `${directory}/`;
    return all.filter(
      (path) =>
        path.startsWith(prefix) &&
        (scope.recursive || !path.slice(prefix.length).includes("/")),
    );
  }

  async read(projectPath: string): Promise<string> {
    const content = this.files.get(projectPath);
    if (content === undefined) throw new Error(`No such document: ${projectPath}`);
    this.reads.push(projectPath);
    return content;
  }

  exists(projectPath: string): boolean {
    return this.files.has(projectPath) || this.extraFiles.includes(projectPath);
  }
}

export const REQUIRED: FrontmatterField[] = [
  "title",
  "description",
  "category",
  "tags",
  "last_updated",
];

export const sampleCorpus: DocumentInput[] = [
  { path: "README.md", content: "# Project\nSee [A](docs/a.md)." },
  {
    path: "docs/a.md",
    content: [
      "---",
      "title: A",
      "description: About a",
      "category: guide",
      "tags: [setup, cli]",
      "last_updated: 2024-01-15",
      "---",
      "# A",
      "Read [B](./b.md) and [gone](./gone.md).",
    ].join("\n"),
  },
  {
    path: "docs/b.md",
    content: "---\ntitle: B\ncategory: reference\ntags: [cli]\n---\nShort text.",
  },
];

export function buildReport(documents: DocumentInput[]) {
  const analyses = documents.map((document) => analyzeDocument(document, REQUIRED));
  const paths = new Set(documents.map((document) => document.path));
  const graph = buildDocumentGraph(analyses, {
    docsDir: "docs",
    exists: (path) => paths.has(path),
  });
  const report = aggregateReport({
    scope: { kind: "corpus", recursive: true },
    analyses,
    graph,
    generatedAt: new Date("2024-05-01T00:00:00Z"),
  });
  return { analyses, graph, report };
}

