import { availableParallelism } from "node:os";
import { resolve } from "node:path";
import pLimit from "p-limit";
import { logger } from "../../logger";
import { AnalysisAbortedError } from "../errors";
import { FilesystemDocumentSource, type DocumentSource } from "../fs/docs";
import { buildDocumentGraph } from "../graph";
import {
  appendHistory,
  historyRowFromReport,
  readHistory,
  summarizeTrend,
  type TrendSummary,
} from "../history";
import { aggregateReport } from "../report/aggregator";
import type {
  DocumentAnalysis,
  DocumentGraph,
  FrontmatterField,
  GlobalConfig,
  Report,
  ScanScope,
} from "../types";
import { analyzeDocument } from "./document";

export interface AnalyzeCorpusOptions {
  source: DocumentSource;
  scope: ScanScope;
  docsDir: string;
  requiredFields: readonly FrontmatterField[];
  /** Worker count; zero or absent means one per available CPU. */
  concurrency?: number;
  signal?: AbortSignal;
  lintingIssues?: number;
  topTags?: number;
  generatedAt?: Date;
}

export interface CorpusAnalysis {
  report: Report;
  graph: DocumentGraph;
  analyses: DocumentAnalysis[];
}

export function resolveConcurrency(requested: number | undefined): number {
  if (requested !== undefined && requested > 0) return Math.floor(requested);
  return Math.max(1, availableParallelism());
}

/**
 * Analyses every document in scope on a bounded pool, then builds the graph and the report.
 *
 * Documents are independent until graph construction, so only the per-document stage runs
 * concurrently. The signal is checked before each document; once it fires no further documents
 * start and the call rejects with {@link AnalysisAbortedError}.
 */
export async function analyzeCorpus(
  options: AnalyzeCorpusOptions,
): Promise<CorpusAnalysis> {
  const { source, signal } = options;
  const paths = await source.list(options.scope);
  const total = paths.length;
  const concurrency = resolveConcurrency(options.concurrency);
  const limit = pLimit(concurrency);
  let completed = 0;

  const checkpoint = () => {
    if (signal?.aborted) {
      limit.clearQueue();
      throw new AnalysisAbortedError(completed, total);
    }
  };

  logger.debug(
    `Analysing ${total} documents with concurrency ${concurrency}`,
  );
  const analyses = await Promise.all(
    paths.map((path) =>
      limit(async () => {
        checkpoint();
        const content = await source.read(path);
        const analysis = analyzeDocument(
          { path, content },
          options.requiredFields,
        );
        completed += 1;
        logger.debug(
          `${path}: quality ${analysis.quality.label} (${analysis.quality.score}/${analysis.quality.maxScore}), readability ${analysis.readability.label}, frontmatter ${analysis.frontmatterStatus}`,
        );
        return analysis;
      }),
    ),
  );
  checkpoint();

  const graph = buildDocumentGraph(analyses, {
    docsDir: options.docsDir,
    exists: (projectPath) => source.exists(projectPath),
  });
  for (const edge of graph.broken) {
    logger.debug(`Broken reference in ${edge.source}: ${edge.target} (${edge.reason})`);
  }

  const report = aggregateReport({
    scope: options.scope,
    analyses,
    graph,
    lintingIssues: options.lintingIssues,
    topTags: options.topTags,
    generatedAt: options.generatedAt,
  });
  return { report, graph, analyses };
}

export interface RunAnalysisOptions {
  scope: ScanScope;
  /** Append a row to the history file. Never applies to single-file scans. */
  history?: boolean;
  signal?: AbortSignal;
  /** Overrides `analysis.timeout_ms`. */
  timeoutMs?: number;
  lintingIssues?: number;
  source?: DocumentSource;
  now?: Date;
}

export interface RunAnalysisResult extends CorpusAnalysis {
  trend: TrendSummary | null;
  historyFile: string | null;
}

/**
 * Configured end-to-end run. History is touched only after the report has been computed, so a
 * failed or aborted run leaves the history file as it was.
 */
export async function runAnalysis(
  config: GlobalConfig,
  options: RunAnalysisOptions,
): Promise<RunAnalysisResult> {
  const source =
    options.source ??
    new FilesystemDocumentSource(config.paths.root, config.paths.docs);
  const now = options.now ?? new Date();
  const deadline = withDeadline(
    options.signal,
    options.timeoutMs ?? config.analysis.timeout_ms,
  );

  let result: CorpusAnalysis;
  try {
    result = await analyzeCorpus({
      source,
      scope: options.scope,
      docsDir: config.paths.docs,
      requiredFields: config.frontmatter.required_fields,
      concurrency: config.analysis.concurrency,
      signal: deadline.signal,
      lintingIssues: options.lintingIssues,
      topTags: config.report.top_tags,
      generatedAt: now,
    });
  } finally {
    deadline.release();
  }

  if (options.scope.kind === "file") {
    return { ...result, trend: null, historyFile: null };
  }

  const historyFile = resolve(config.paths.root, config.paths.history);
  const row = historyRowFromReport(result.report, now);
  const trend = summarizeTrend(await readHistory(historyFile), row);
  if (options.history === false) {
    return { ...result, trend, historyFile: null };
  }
  await appendHistory(historyFile, row);
  logger.debug(`Appended history row to ${historyFile}`);
  return { ...result, trend, historyFile };
}

interface Deadline {
  signal: AbortSignal | undefined;
  /** Detaches the listeners added to the caller's signal. */
  release: () => void;
}

const noop = () => undefined;

function withDeadline(
  signal: AbortSignal | undefined,
  timeoutMs: number,
): Deadline {
  if (timeoutMs <= 0) return { signal, release: noop };
  const deadline = AbortSignal.timeout(timeoutMs);
  if (!signal) return { signal: deadline, release: noop };
  const controller = new AbortController();
  const forward = () => controller.abort();
  const release = () => {
    signal.removeEventListener("abort", forward);
    deadline.removeEventListener("abort", forward);
  };
  if (signal.aborted || deadline.aborted) {
    forward();
  } else {
    signal.addEventListener("abort", forward, { once: true });
    deadline.addEventListener("abort", forward, { once: true });
  }
  return { signal: controller.signal, release };
}
