import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { parse } from "yaml";
import { DocsInputError } from "../errors";
import type { FrontmatterField, GlobalConfig, LogLevel } from "../types";

export const DEFAULT_CONFIG_FILE = "docs-health.config.yaml";

const FRONTMATTER_FIELDS: readonly FrontmatterField[] = [
  "title",
  "description",
  "category",
  "tags",
  "related",
  "last_updated",
];

let cachedConfig: GlobalConfig | null = null;

export function defaultConfig(): GlobalConfig {
  return {
    version: 1,
    paths: {
      root: process.cwd(),
      docs: "docs",
      reports: "target/reports/docs_validation",
      history: "target/reports/docs_validation/documentation_metrics_history.csv",
      log_level: "info",
    },
    analysis: {
      concurrency: 0,
      recursive: true,
      timeout_ms: 0,
    },
    frontmatter: {
      required_fields: [
        "title",
        "description",
        "category",
        "tags",
        "last_updated",
      ],
    },
    report: {
      ci_threshold: 70,
      top_tags: 10,
    },
  };
}

/**
 * Loads and caches the global configuration.
 *
 * The loader consults the `DOCS_HEALTH_CONFIG` environment variable first (or an explicit
 * path from the CLI). When neither is given it looks for `${process.cwd()}/docs-health.config.yaml`
 * and falls back to defaults if that file is absent. Environment overrides:
 * - `DOCS_HEALTH_ROOT` overrides `paths.root`
 * - `DOCS_HEALTH_DOCS_DIR` overrides `paths.docs`
 * - `DOCS_HEALTH_LOG_LEVEL` overrides `paths.log_level`
 *
 * @throws DocsInputError when an explicitly named configuration file does not exist.
 */
export function loadConfig(explicitPath?: string): GlobalConfig {
  if (cachedConfig && !explicitPath) return cachedConfig;
  const namedPath = explicitPath ?? process.env.DOCS_HEALTH_CONFIG;
  const configPath = namedPath ?? resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  const config = defaultConfig();
  if (existsSync(configPath)) {
    const parsed: unknown = parse(readFileSync(configPath, "utf8"));
    mergeConfig(config, parsed);
    config.paths.root = resolve(dirname(configPath), config.paths.root);
  } else if (namedPath) {
    throw new DocsInputError(
      `Missing configuration file at ${configPath}`,
      configPath,
    );
  }
  config.paths.root = resolve(process.env.DOCS_HEALTH_ROOT ?? config.paths.root);
  config.paths.docs = trimSlashes(
    process.env.DOCS_HEALTH_DOCS_DIR ?? config.paths.docs,
  );
  config.paths.log_level = normalizeLogLevel(
    process.env.DOCS_HEALTH_LOG_LEVEL ?? config.paths.log_level,
  );
  cachedConfig = config;
  return config;
}

/**
 * Resets the configuration cache. Primarily used by tests to ensure isolation.
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}

function mergeConfig(target: GlobalConfig, source: unknown): void {
  if (!isRecord(source)) return;
  if (typeof source.version === "number") target.version = source.version;

  const paths = source.paths;
  if (isRecord(paths)) {
    if (typeof paths.root === "string") target.paths.root = paths.root;
    if (typeof paths.docs === "string") target.paths.docs = paths.docs;
    if (typeof paths.reports === "string") target.paths.reports = paths.reports;
    if (typeof paths.history === "string") target.paths.history = paths.history;
    if (typeof paths.log_level === "string") {
      target.paths.log_level = normalizeLogLevel(paths.log_level);
    }
  }

  const analysis = source.analysis;
  if (isRecord(analysis)) {
    if (typeof analysis.concurrency === "number") {
      target.analysis.concurrency = Math.max(0, Math.floor(analysis.concurrency));
    }
    if (typeof analysis.recursive === "boolean") {
      target.analysis.recursive = analysis.recursive;
    }
    if (typeof analysis.timeout_ms === "number") {
      target.analysis.timeout_ms = Math.max(0, analysis.timeout_ms);
    }
  }

  const frontmatter = source.frontmatter;
  if (isRecord(frontmatter) && Array.isArray(frontmatter.required_fields)) {
    target.frontmatter.required_fields = frontmatter.required_fields.filter(
      (field): field is FrontmatterField =>
        typeof field === "string" &&
        FRONTMATTER_FIELDS.some((known) => known === field),
    );
  }

  const report = source.report;
  if (isRecord(report)) {
    if (typeof report.ci_threshold === "number") {
      target.report.ci_threshold = report.ci_threshold;
    }
    if (typeof report.top_tags === "number") {
      target.report.top_tags = report.top_tags;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function trimSlashes(value: string): string {
  return value.replace(/^\.?\/+/, "").replace(/\/+$/, "");
}

function normalizeLogLevel(level: string | LogLevel): LogLevel {
  const normalized = String(level).toLowerCase();
  if (normalized === "debug") return "debug";
  if (normalized === "warn") return "warn";
  if (normalized === "error") return "error";
  return "info";
}
