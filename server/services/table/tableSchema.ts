import type { TableColumnMap } from "../../config/pipelineConfig";
import type {
  DuplicateIdWarning,
  EmptySourceWarning,
  PipelineWarning,
} from "../errors";
import {
  hasSourceText,
  type RecordExtension,
  type ScalarValue,
  type TranslationRecord,
} from "../../models/TranslationRecord";

/** A parsed cell: null when the cell was missing or left unquoted-empty. */
export type TableCell = string | null;

export type TableRow = Record<string, ScalarValue | null | undefined>;

export interface TableValidationResult {
  valid: boolean;
  errors: string[];
  warnings: PipelineWarning[];
  rowCount: number;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

export const requiredColumns = (columns: TableColumnMap): string[] => [
  columns.id,
  columns.externalRef,
  columns.objectRef,
  columns.displayKey,
  columns.sourceText,
];

const modeledColumns = (columns: TableColumnMap): Set<string> =>
  new Set([...requiredColumns(columns), columns.maxLength, columns.category]);

export function findMissingColumns(header: readonly string[], columns: TableColumnMap): string[] {
  const present = new Set(header);
  return requiredColumns(columns).filter((column) => !present.has(column));
}

const parseInteger = (cell: TableCell): number | null => {
  const trimmed = cell?.trim();
  if (!trimmed || !INTEGER_PATTERN.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
};

export interface RowParseOutcome {
  record: TranslationRecord | null;
  errors: string[];
}

/**
 * Converts one data row into a record. `rowNumber` is 1-based over data rows
 * and only used in messages.
 */
export function parseRecordRow(
  header: readonly string[],
  cells: readonly TableCell[],
  columns: TableColumnMap,
  rowNumber: number,
): RowParseOutcome {
  const errors: string[] = [];
  const cellOf = (column: string): TableCell => {
    const index = header.indexOf(column);
    return index === -1 ? null : (cells[index] ?? null);
  };

  const id = parseInteger(cellOf(columns.id));
  if (id === null) {
    errors.push(`row ${rowNumber}: ${columns.id} must be an integer, got ${JSON.stringify(cellOf(columns.id))}`);
  }

  let maxLength: number | null = null;
  const maxLengthCell = cellOf(columns.maxLength);
  if (maxLengthCell !== null && maxLengthCell.trim() !== "") {
    maxLength = parseInteger(maxLengthCell);
    if (maxLength === null || maxLength <= 0) {
      errors.push(`row ${rowNumber}: ${columns.maxLength} must be a positive integer, got ${JSON.stringify(maxLengthCell)}`);
      maxLength = null;
    }
  }

  if (errors.length || id === null) {
    return { record: null, errors };
  }

  const category = cellOf(columns.category);
  const modeled = modeledColumns(columns);
  const extension: RecordExtension = {};
  header.forEach((column, index) => {
    if (modeled.has(column)) return;
    const cell = cells[index];
    if (cell === null || cell === undefined) return;
    extension[column] = cell;
  });

  return {
    record: {
      id,
      externalRef: cellOf(columns.externalRef) ?? "",
      objectRef: cellOf(columns.objectRef) ?? "",
      displayKey: cellOf(columns.displayKey) ?? "",
      sourceText: cellOf(columns.sourceText) ?? "",
      maxLength,
      category,
      extension,
    },
    errors: [],
  };
}

/** Non-fatal checks over a parsed record set: duplicate ids and empty source text. */
export function collectRecordWarnings(records: readonly TranslationRecord[]): PipelineWarning[] {
  const warnings: PipelineWarning[] = [];
  const seen = new Set<number>();
  const reported = new Set<number>();
  records.forEach((record, index) => {
    if (seen.has(record.id) && !reported.has(record.id)) {
      reported.add(record.id);
      warnings.push({
        kind: "duplicate_id",
        recordId: record.id,
        message: `Duplicate id ${record.id}`,
      } satisfies DuplicateIdWarning);
    }
    seen.add(record.id);
    if (!hasSourceText(record)) {
      warnings.push(emptySourceWarning(record, index + 1));
    }
  });
  return warnings;
}

const emptySourceWarning = (record: TranslationRecord, row: number): EmptySourceWarning => ({
  kind: "empty_source",
  recordId: record.id,
  row,
  message: `Record ${record.id} (row ${row}) has empty source text`,
});

export interface PartitionedRecords {
  accepted: TranslationRecord[];
  rejected: TranslationRecord[];
  warnings: EmptySourceWarning[];
}

/** Splits off records that must not enter translation. */
export function partitionTranslatable(records: readonly TranslationRecord[]): PartitionedRecords {
  const accepted: TranslationRecord[] = [];
  const rejected: TranslationRecord[] = [];
  const warnings: EmptySourceWarning[] = [];
  records.forEach((record, index) => {
    if (hasSourceText(record)) {
      accepted.push(record);
    } else {
      rejected.push(record);
      warnings.push(emptySourceWarning(record, index + 1));
    }
  });
  return { accepted, rejected, warnings };
}

/**
 * Modeled fields plus extension cells. Given the source header, the row holds
 * exactly its columns in its order, so optional modeled columns the source
 * never had are not added.
 */
export function recordToRow(
  record: TranslationRecord,
  columns: TableColumnMap,
  header: readonly string[] | null = null,
): TableRow {
  const modeled: TableRow = {
    [columns.id]: record.id,
    [columns.externalRef]: record.externalRef,
    [columns.objectRef]: record.objectRef,
    [columns.displayKey]: record.displayKey,
    [columns.sourceText]: record.sourceText,
    [columns.maxLength]: record.maxLength,
    [columns.category]: record.category,
  };
  if (!header) {
    return { ...modeled, ...record.extension };
  }
  const row: TableRow = {};
  for (const column of header) {
    row[column] = Object.prototype.hasOwnProperty.call(modeled, column)
      ? modeled[column]
      : (record.extension[column] ?? null);
  }
  for (const [column, value] of Object.entries(record.extension)) {
    if (!(column in row)) row[column] = value;
  }
  return row;
}
