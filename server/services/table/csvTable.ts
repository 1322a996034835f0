import fs from "node:fs/promises";
import path from "node:path";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import type { TableColumnMap } from "../../config/pipelineConfig";
import type { TranslationRecord } from "../../models/TranslationRecord";
import type { TranslationsByLanguage } from "../../models/TranslationResult";
import { describeError, SchemaError, type PipelineWarning } from "../errors";
import { createLogger, type Logger } from "../logger";
import {
  collectRecordWarnings,
  findMissingColumns,
  parseRecordRow,
  recordToRow,
  type TableCell,
  type TableRow,
  type TableValidationResult,
} from "./tableSchema";

export interface TableReadResult {
  /** Column names in source order; pass to the row builders to write the same columns back. */
  header: string[];
  records: TranslationRecord[];
  warnings: PipelineWarning[];
}

interface RawTable {
  header: string[];
  rows: TableCell[][];
}

const defaultLogger = () => createLogger("csv-table");

const isCellRow = (value: unknown): value is TableCell[] =>
  Array.isArray(value) &&
  value.every((cell) => cell === null || typeof cell === "string");

function parseRawTable(content: string): RawTable {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      // unquoted empty cells are "missing"; quoted empty cells are empty strings
      cast: (value, context) => (value === "" && !context.quoting ? null : value),
    });
  } catch (error) {
    throw new SchemaError(`Table is not valid CSV: ${describeError(error)}`);
  }
  if (!Array.isArray(parsed) || !parsed.every(isCellRow)) {
    throw new SchemaError("Table is not valid CSV");
  }
  const [headerCells, ...rows] = parsed;
  const header = (headerCells ?? []).map((cell) => (cell ?? "").trim());
  return { header, rows };
}

export function parseTable(
  content: string,
  columns: TableColumnMap,
  logger: Logger = defaultLogger(),
): TableReadResult {
  const { header, rows } = parseRawTable(content);

  const problems: string[] = [];
  const missing = findMissingColumns(header, columns);
  if (missing.length) {
    problems.push(`Missing required columns: ${missing.join(", ")}`);
  }
  if (!rows.length) {
    problems.push("Table is empty");
  }
  if (problems.length) {
    throw new SchemaError(problems.join("; "), problems);
  }

  const records: TranslationRecord[] = [];
  const rowErrors: string[] = [];
  rows.forEach((cells, index) => {
    const outcome = parseRecordRow(header, cells, columns, index + 1);
    if (outcome.record) {
      records.push(outcome.record);
    }
    rowErrors.push(...outcome.errors);
  });
  if (rowErrors.length) {
    throw new SchemaError(`Table has ${rowErrors.length} invalid cell(s)`, rowErrors);
  }

  const warnings = collectRecordWarnings(records);
  for (const warning of warnings) {
    logger.warn({ warning }, warning.message);
  }
  return { header, records, warnings };
}

export async function readTable(
  filePath: string,
  columns: TableColumnMap,
  logger: Logger = defaultLogger(),
): Promise<TableReadResult> {
  logger.info({ filePath }, "Reading table");
  const content = await fs.readFile(filePath, "utf8");
  const result = parseTable(content, columns, logger);
  logger.info({ filePath, records: result.records.length }, "Loaded translation records");
  return result;
}

export function validateTableContent(
  content: string,
  columns: TableColumnMap,
): TableValidationResult {
  try {
    const { records, warnings } = parseTable(content, columns, defaultLogger());
    return { valid: true, errors: [], warnings, rowCount: records.length };
  } catch (error) {
    if (error instanceof SchemaError) {
      return {
        valid: false,
        errors: error.details.length ? error.details : [error.message],
        warnings: [],
        rowCount: 0,
      };
    }
    throw error;
  }
}

export async function validateTable(
  filePath: string,
  columns: TableColumnMap,
): Promise<TableValidationResult> {
  const content = await fs.readFile(filePath, "utf8");
  return validateTableContent(content, columns);
}

/** Union of row keys in first-seen order. */
export const collectColumns = (rows: readonly TableRow[]): string[] => {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
};

export function stringifyTable(rows: readonly TableRow[]): string {
  const columns = collectColumns(rows);
  const body = rows.map((row) => columns.map((column) => row[column] ?? null));
  return stringify([columns, ...body], {
    // strings are quoted so that an empty string stays distinguishable from a missing cell
    quoted_string: true,
    cast: { boolean: (value: boolean) => (value ? "true" : "false") },
  });
}

export async function writeTable(
  rows: readonly TableRow[],
  outputPath: string,
  logger: Logger = defaultLogger(),
): Promise<string> {
  logger.info({ outputPath, rows: rows.length }, "Writing table");
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.writeFile(outputPath, stringifyTable(rows), "utf8");
  return outputPath;
}

export const recordsToRows = (
  records: readonly TranslationRecord[],
  columns: TableColumnMap,
  header: readonly string[] | null = null,
): TableRow[] => records.map((record) => recordToRow(record, columns, header));

/** One row per record and target language. */
export function buildResultRows(
  records: readonly TranslationRecord[],
  translations: TranslationsByLanguage,
  columns: TableColumnMap,
  header: readonly string[] | null = null,
): TableRow[] {
  const rows: TableRow[] = [];
  for (const [targetLang, results] of Object.entries(translations)) {
    results.forEach((result, index) => {
      const record = records[index];
      if (!record) return;
      rows.push({
        ...recordToRow(record, columns, header),
        target_lang: targetLang,
        translated_text: result.translatedText,
        model: result.model,
        prompt_tokens: result.usage.promptTokens,
        completion_tokens: result.usage.completionTokens,
        timestamp: result.timestamp,
      });
    });
  }
  return rows;
}
