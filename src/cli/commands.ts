import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { runAnalysis, type RunAnalysisResult } from "../core/analysis";
import { DocsInputError } from "../core/errors";
import { comparePaths } from "../core/graph";
import { applyLinkFixes, suggestLinkFixes, type LinkFix } from "../core/links/fixer";
import { planFrontmatterFix } from "../core/metadata/fixer";
import {
  renderCsv,
  renderDot,
  renderMarkdown,
  renderText,
} from "../core/report/render";
import type { GlobalConfig, ScanScope } from "../core/types";
import { chalk, logger } from "../logger";

export const OUTPUT_FORMATS = ["text", "markdown", "csv", "dot"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const DEFAULT_REPORT_FILES: Record<Exclude<OutputFormat, "text">, string> = {
  markdown: "documentation_report.md",
  csv: "documentation_metrics.csv",
  dot: "document_relationships.dot",
};

const RENDERERS: Record<OutputFormat, (result: RunAnalysisResult) => string> = {
  text: ({ report, trend }) => renderText(report, trend),
  markdown: ({ report, trend }) => renderMarkdown(report, trend),
  csv: ({ report }) => renderCsv(report),
  dot: ({ graph }) => renderDot(graph),
};

export interface ScopeOptions {
  file?: string;
  dir?: string;
  recursive?: boolean;
  timeout?: number;
}

export interface ReportOptions extends ScopeOptions {
  format: OutputFormat;
  output?: string;
  history: boolean;
  lintIssues?: number;
}

export interface FixLinksOptions extends ScopeOptions {
  dryRun?: boolean;
}

export type FixFrontmatterOptions = FixLinksOptions;

export interface CommandContext {
  config: GlobalConfig;
  env: NodeJS.ProcessEnv;
  /** Receives rendered output destined for stdout. */
  write: (text: string) => void;
  /** Clock for `last_updated` values; defaults to the current time. */
  now?: () => Date;
}

/**
 * Maps the `--file`/`--dir`/`--[no-]recursive` flags onto a scan scope. Without a recursion flag
 * `analysis.recursive` applies. User paths are taken relative to the working directory.
 */
export function scopeFromOptions(
  options: ScopeOptions,
  config: GlobalConfig,
  cwd: string = process.cwd(),
): ScanScope {
  if (options.file && options.dir) {
    throw new DocsInputError("Use either --file or --dir, not both");
  }
  const recursive = options.recursive ?? config.analysis.recursive;
  if (options.file) return { kind: "file", path: resolve(cwd, options.file) };
  if (options.dir) {
    return { kind: "directory", path: resolve(cwd, options.dir), recursive };
  }
  return { kind: "corpus", recursive };
}

async function writeOutput(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf8");
}

/**
 * Builds the report and renders it. Returns the process exit code.
 */
export async function reportCommand(
  options: ReportOptions,
  context: CommandContext,
): Promise<number> {
  const { config } = context;
  const scope = scopeFromOptions(options, config);
  const result = await runAnalysis(config, {
    scope,
    history: options.history,
    timeoutMs: options.timeout,
    lintingIssues: options.lintIssues,
  });
  const { report } = result;

  const rendered = RENDERERS[options.format](result);

  if (options.output) {
    const target = resolve(options.output);
    await writeOutput(target, rendered);
    logger.success(`Wrote ${options.format} report to ${target}`);
  } else if (options.format === "text") {
    context.write(rendered);
  } else {
    const target = resolve(
      config.paths.root,
      config.paths.reports,
      DEFAULT_REPORT_FILES[options.format],
    );
    await writeOutput(target, rendered);
    logger.success(`Wrote ${options.format} report to ${target}`);
  }
  if (result.historyFile) {
    logger.info(`History updated: ${result.historyFile}`);
  }

  const summary = `Health score ${report.healthScore}/100 (${report.healthRating})`;
  if (context.env.CI === "true" && report.healthScore < config.report.ci_threshold) {
    logger.error(
      `${summary} is below the CI threshold of ${config.report.ci_threshold}`,
    );
    return 1;
  }
  logger.info(summary);
  return 0;
}

/**
 * Lists broken references. Exits 1 when any exist.
 */
export async function checkLinksCommand(
  options: ScopeOptions,
  context: CommandContext,
): Promise<number> {
  const { report } = await runAnalysis(context.config, {
    scope: scopeFromOptions(options, context.config),
    history: false,
    timeoutMs: options.timeout,
  });
  if (report.brokenEdges.length === 0) {
    logger.success(
      `No broken references in ${report.inventory.totalDocuments} documents`,
    );
    return 0;
  }
  for (const edge of report.brokenEdges) {
    context.write(
      `${edge.source}: ${chalk.red(edge.target)} -> ${edge.resolved} (${edge.reason})\n`,
    );
  }
  logger.warn(`${report.brokenEdges.length} broken references found`);
  return 1;
}

/**
 * Rewrites broken references that have an unambiguous match. `--dry-run` only prints them.
 */
export async function fixLinksCommand(
  options: FixLinksOptions,
  context: CommandContext,
): Promise<number> {
  const { config } = context;
  const { graph } = await runAnalysis(config, {
    scope: scopeFromOptions(options, config),
    history: false,
    timeoutMs: options.timeout,
  });
  const plan = suggestLinkFixes(graph, config.paths.docs);

  const bySource = new Map<string, LinkFix[]>();
  for (const fix of plan.fixes) {
    const bucket = bySource.get(fix.source) ?? [];
    bucket.push(fix);
    bySource.set(fix.source, bucket);
  }

  for (const [source, fixes] of bySource) {
    for (const fix of fixes) {
      context.write(`${source}: ${fix.target} -> ${chalk.green(fix.replacement)}\n`);
    }
    if (options.dryRun) continue;
    const file = resolve(config.paths.root, source);
    const original = await readFile(file, "utf8");
    const { content, replaced } = applyLinkFixes(original, fixes);
    if (content !== original) {
      await writeFile(file, content, "utf8");
      logger.debug(`Rewrote ${replaced} references in ${source}`);
    }
  }

  for (const edge of plan.unfixable) {
    logger.warn(`No match for ${edge.target} in ${edge.source}`);
  }
  const verb = options.dryRun ? "Proposed" : "Applied";
  logger.info(`${verb} ${plan.fixes.length} link fixes, ${plan.unfixable.length} left unresolved`);
  return 0;
}

/**
 * Fills in front-matter fields that can be derived from the document. `--dry-run` only prints
 * the fields that would be added.
 */
export async function fixFrontmatterCommand(
  options: FixFrontmatterOptions,
  context: CommandContext,
): Promise<number> {
  const { config } = context;
  const { analyses } = await runAnalysis(config, {
    scope: scopeFromOptions(options, config),
    history: false,
    timeoutMs: options.timeout,
  });
  const today = (context.now?.() ?? new Date()).toISOString().slice(0, 10);

  let patched = 0;
  const pending = analyses
    .filter((analysis) => analysis.frontmatterStatus !== "complete")
    .sort((a, b) => comparePaths(a.path, b.path));
  for (const analysis of pending) {
    const file = resolve(config.paths.root, analysis.path);
    const original = await readFile(file, "utf8");
    const patch = planFrontmatterFix(
      analysis.path,
      original,
      config.frontmatter.required_fields,
      today,
    );
    if (patch.added.length > 0) {
      patched += 1;
      context.write(`${analysis.path}: ${chalk.green(`+ ${patch.added.join(", ")}`)}\n`);
      if (!options.dryRun) await writeFile(file, patch.content, "utf8");
    }
    if (patch.remaining.length > 0) {
      logger.warn(`${analysis.path}: still missing ${patch.remaining.join(", ")}`);
    }
  }

  const verb = options.dryRun ? "Would update" : "Updated";
  logger.info(`${verb} front-matter in ${patched} of ${pending.length} documents`);
  return 0;
}
