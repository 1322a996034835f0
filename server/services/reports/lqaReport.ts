import fs from "node:fs/promises";
import path from "node:path";

import { stringify } from "csv-stringify/sync";

import {
  QUALITY_STATUSES,
  type LqaResultEntry,
  type LqaResultFile,
  type QualityStatus,
} from "../../models/QualityEvaluation";
import { ConfigError } from "../errors";
import { formatScore } from "../quality/scoring";

export const REPORT_FORMATS = ["json", "csv", "html"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

const LOWEST_ENTRY_LIMIT = 5;

export interface LqaReportSummary {
  sourceLang: string;
  targetLang: string;
  totalEntries: number;
  evaluatedEntries: number;
  statusCounts: Record<QualityStatus, number>;
  averageScore: number | null;
  dimensionAverages: Record<string, number>;
  lowestEntries: Array<{
    recordId: number;
    displayKey: string;
    weightedScore: number;
    status: QualityStatus;
  }>;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

const evaluated = (entries: readonly LqaResultEntry[]) =>
  entries.flatMap((entry) => (entry.evaluation ? [{ entry, evaluation: entry.evaluation }] : []));

export function summarizeLqaResults(file: LqaResultFile): LqaReportSummary {
  const scored = evaluated(file.entries);
  const statusCounts: Record<QualityStatus, number> = {
    approved: 0,
    needs_review: 0,
    rejected: 0,
  };
  for (const { evaluation } of scored) {
    statusCounts[evaluation.status] += 1;
  }

  const dimensionNames = Object.keys(file.criteria.weights);
  const dimensionAverages: Record<string, number> = {};
  for (const name of dimensionNames) {
    const values = scored
      .map(({ evaluation }) => evaluation.dimensionScores[name])
      .filter((value): value is number => typeof value === "number");
    if (values.length) {
      dimensionAverages[name] = round2(values.reduce((sum, value) => sum + value, 0) / values.length);
    }
  }

  const lowestEntries = [...scored]
    .sort((a, b) => a.evaluation.weightedScore - b.evaluation.weightedScore)
    .slice(0, LOWEST_ENTRY_LIMIT)
    .map(({ entry, evaluation }) => ({
      recordId: entry.recordId,
      displayKey: entry.displayKey,
      weightedScore: evaluation.weightedScore,
      status: evaluation.status,
    }));

  return {
    sourceLang: file.sourceLang,
    targetLang: file.targetLang,
    totalEntries: file.entries.length,
    evaluatedEntries: scored.length,
    statusCounts,
    averageScore: scored.length
      ? round2(scored.reduce((sum, { evaluation }) => sum + evaluation.weightedScore, 0) / scored.length)
      : null,
    dimensionAverages,
    lowestEntries,
  };
}

export function renderJsonReport(file: LqaResultFile): string {
  return `${JSON.stringify({ summary: summarizeLqaResults(file), entries: file.entries }, null, 2)}\n`;
}

export function renderCsvReport(file: LqaResultFile): string {
  const dimensions = Object.keys(file.criteria.weights);
  const header = ["record_id", "display_key", "weighted_score", "status", ...dimensions];
  const rows = file.entries.map((entry) => [
    entry.recordId,
    entry.displayKey,
    entry.evaluation ? entry.evaluation.weightedScore : null,
    entry.evaluation ? entry.evaluation.status : null,
    ...dimensions.map((name) => entry.evaluation?.dimensionScores[name] ?? null),
  ]);
  return stringify([header, ...rows]);
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

export function renderHtmlReport(file: LqaResultFile): string {
  const summary = summarizeLqaResults(file);
  const title = `LQA report ${escapeHtml(summary.sourceLang)} &rarr; ${escapeHtml(summary.targetLang)}`;
  const statusRows = QUALITY_STATUSES.map(
    (status) => `<tr><th>${status}</th><td>${summary.statusCounts[status]}</td></tr>`,
  ).join("\n");
  const dimensionRows = Object.entries(summary.dimensionAverages)
    .map(([name, value]) => `<tr><th>${escapeHtml(name)}</th><td>${formatScore(value)}</td></tr>`)
    .join("\n");
  const entryRows = file.entries
    .map((entry) => {
      const score = entry.evaluation ? formatScore(entry.evaluation.weightedScore) : "-";
      const status = entry.evaluation ? entry.evaluation.status : "unevaluated";
      return [
        "<tr>",
        `<td>${entry.recordId}</td>`,
        `<td>${escapeHtml(entry.displayKey)}</td>`,
        `<td>${escapeHtml(entry.sourceText)}</td>`,
        `<td>${escapeHtml(entry.translatedText)}</td>`,
        `<td>${score}</td>`,
        `<td class="${status}">${status}</td>`,
        "</tr>",
      ].join("");
    })
    .join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title}</title>
</head>
<body>
<h1>${title}</h1>
<p>Evaluated ${summary.evaluatedEntries} of ${summary.totalEntries} entries. Average score: ${
    summary.averageScore === null ? "-" : formatScore(summary.averageScore)
  }</p>
<table class="status">
${statusRows}
</table>
<table class="dimensions">
${dimensionRows}
</table>
<table class="entries">
<tr><th>ID</th><th>Key</th><th>Source</th><th>Translation</th><th>Score</th><th>Status</th></tr>
${entryRows}
</table>
</body>
</html>
`;
}

const RENDERERS: Record<ReportFormat, (file: LqaResultFile) => string> = {
  json: renderJsonReport,
  csv: renderCsvReport,
  html: renderHtmlReport,
};

export function parseReportFormats(value: string): ReportFormat[] {
  if (value === "all") return [...REPORT_FORMATS];
  const format = REPORT_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new ConfigError(`Unknown report format "${value}" (expected json, csv, html or all)`);
  }
  return [format];
}

export async function writeLqaReports(
  file: LqaResultFile,
  outputDir: string,
  formats: readonly ReportFormat[],
): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });
  const written: string[] = [];
  for (const format of formats) {
    const target = path.join(outputDir, `lqa_report_${file.targetLang}.${format}`);
    await fs.writeFile(target, RENDERERS[format](file), "utf8");
    written.push(target);
  }
  return written;
}
