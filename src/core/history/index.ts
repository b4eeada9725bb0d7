import { appendFile, mkdir, readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import type { HistoryRow, Report } from "../types";

export const HISTORY_HEADER =
  "date,total_docs,health_score,broken_links,frontmatter_issues,excellent,good,adequate,poor,very_poor";

export interface TrendSummary {
  previousDate: string;
  previousScore: number;
  currentScore: number;
  delta: number;
}

export function historyRowFromReport(report: Report, date: Date): HistoryRow {
  return {
    date: date.toISOString().slice(0, 10),
    totalDocs: report.inventory.totalDocuments,
    healthScore: report.healthScore,
    brokenLinks: report.brokenEdges.length,
    frontmatterIssues: report.frontmatterIssues.length,
    excellent: report.qualityDistribution.Excellent,
    good: report.qualityDistribution.Good,
    adequate: report.qualityDistribution.Adequate,
    poor: report.qualityDistribution.Poor,
    veryPoor: report.qualityDistribution["Very Poor"],
  };
}

export function formatHistoryRow(row: HistoryRow): string {
  return [
    row.date,
    row.totalDocs,
    row.healthScore,
    row.brokenLinks,
    row.frontmatterIssues,
    row.excellent,
    row.good,
    row.adequate,
    row.poor,
    row.veryPoor,
  ].join(",");
}

/**
 * Appends one row to the history file, creating it with a header first when it does not exist.
 * Prior rows are never rewritten; the header and row go out in a single append.
 */
export async function appendHistory(
  file: string,
  row: HistoryRow,
): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  const line = `${formatHistoryRow(row)}\n`;
  const payload = existsSync(file) ? line : `${HISTORY_HEADER}\n${line}`;
  await appendFile(file, payload, "utf8");
}

/**
 * Reads every well-formed row; a missing file is an empty history.
 */
export async function readHistory(file: string): Promise<HistoryRow[]> {
  if (!existsSync(file)) return [];
  const content = await readFile(file, "utf8");
  const rows: HistoryRow[] = [];
  for (const line of content.split(/\r?\n/)) {
    const row = parseHistoryRow(line);
    if (row) rows.push(row);
  }
  return rows;
}

export function parseHistoryRow(line: string): HistoryRow | null {
  const cells = line.trim().split(",");
  if (cells.length !== 10) return null;
  const [date = "", ...rest] = cells;
  if (!/^\d{4}-\d{2}-\d{2}/.test(date)) return null;
  const numbers = rest.map((cell) => Number.parseInt(cell, 10));
  if (numbers.some((value) => Number.isNaN(value))) return null;
  const [
    totalDocs = 0,
    healthScore = 0,
    brokenLinks = 0,
    frontmatterIssues = 0,
    excellent = 0,
    good = 0,
    adequate = 0,
    poor = 0,
    veryPoor = 0,
  ] = numbers;
  return {
    date,
    totalDocs,
    healthScore,
    brokenLinks,
    frontmatterIssues,
    excellent,
    good,
    adequate,
    poor,
    veryPoor,
  };
}

/**
 * Compares the current run with the most recent stored row.
 */
export function summarizeTrend(
  previousRows: readonly HistoryRow[],
  current: HistoryRow,
): TrendSummary | null {
  const previous = previousRows[previousRows.length - 1];
  if (!previous) return null;
  return {
    previousDate: previous.date,
    previousScore: previous.healthScore,
    currentScore: current.healthScore,
    delta: current.healthScore - previous.healthScore,
  };
}
