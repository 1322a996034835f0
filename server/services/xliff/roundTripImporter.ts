import type { TableColumnMap } from "../../config/pipelineConfig";
import type { ExchangeDocument } from "../../models/ExchangeDocument";
import type { TranslationRecord } from "../../models/TranslationRecord";
import type {
  MissingTranslationWarning,
  OrphanUnitWarning,
  PipelineWarning,
} from "../errors";
import { createLogger, type Logger } from "../logger";
import { recordToRow, type TableRow } from "../table/tableSchema";

export interface ImportedRecord extends TranslationRecord {
  /** target language -> reviewed text; null when the documents had no unit for the record */
  translations: Record<string, string | null>;
}

export interface ImportStats {
  /** Per target language: how many records received a translation. */
  imported: Record<string, number>;
  orphaned: number;
  missing: number;
}

export interface ImportResult {
  records: ImportedRecord[];
  languages: string[];
  warnings: PipelineWarning[];
  stats: ImportStats;
}

/**
 * Merges reviewed exchange documents back onto the original records. Units
 * that match no record are reported and skipped; records without a unit get
 * null for that language.
 */
export function importReviewedDocuments(
  records: readonly TranslationRecord[],
  documents: readonly ExchangeDocument[],
  logger: Logger = createLogger("round-trip-importer"),
): ImportResult {
  const knownIds = new Set(records.map((record) => String(record.id)));
  const warnings: PipelineWarning[] = [];
  const textsByLang = new Map<string, Map<string, string>>();

  for (const doc of documents) {
    const texts = textsByLang.get(doc.targetLang) ?? new Map<string, string>();
    textsByLang.set(doc.targetLang, texts);
    for (const unit of doc.units) {
      if (!knownIds.has(unit.id)) {
        const warning: OrphanUnitWarning = {
          kind: "orphan_unit",
          unitId: unit.id,
          targetLang: doc.targetLang,
          message: `Unit ${unit.id} in ${doc.targetLang} matches no record; skipped`,
        };
        logger.warn({ warning }, warning.message);
        warnings.push(warning);
        continue;
      }
      if (unit.target === null) continue;
      texts.set(unit.id, unit.target);
    }
  }

  const languages = [...textsByLang.keys()];
  const imported: Record<string, number> = Object.fromEntries(languages.map((lang) => [lang, 0]));
  let missing = 0;

  const merged = records.map((record): ImportedRecord => {
    const translations: Record<string, string | null> = {};
    for (const lang of languages) {
      const text = textsByLang.get(lang)?.get(String(record.id));
      if (text === undefined) {
        translations[lang] = null;
        missing += 1;
        const warning: MissingTranslationWarning = {
          kind: "missing_translation",
          recordId: record.id,
          targetLang: lang,
          message: `Record ${record.id} has no ${lang} translation`,
        };
        logger.warn({ warning }, warning.message);
        warnings.push(warning);
      } else {
        translations[lang] = text;
        imported[lang] += 1;
      }
    }
    return { ...record, translations };
  });

  const orphaned = warnings.filter((warning) => warning.kind === "orphan_unit").length;
  logger.info({ languages, imported, orphaned, missing }, "Imported reviewed translations");
  return { records: merged, languages, warnings, stats: { imported, orphaned, missing } };
}

/** Original columns plus one column per target language, named by its code. */
export function importedRecordsToRows(
  records: readonly ImportedRecord[],
  languages: readonly string[],
  columns: TableColumnMap,
  header: readonly string[] | null = null,
): TableRow[] {
  return records.map((record) => {
    const row = recordToRow(record, columns, header);
    for (const lang of languages) {
      row[lang] = record.translations[lang] ?? null;
    }
    return row;
  });
}
