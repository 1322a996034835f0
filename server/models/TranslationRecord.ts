export type ScalarValue = string | number | boolean;

/** Columns of the source table that are not part of the record model. */
export type RecordExtension = Record<string, ScalarValue>;

export interface TranslationRecord {
  id: number;
  /** Opaque identifier used to correlate the record with other systems. */
  externalRef: string;
  objectRef: string;
  /** Human-readable label; becomes the unit resname/name in XLIFF. */
  displayKey: string;
  sourceText: string;
  maxLength: number | null;
  category: string | null;
  extension: RecordExtension;
}

export const hasSourceText = (record: Pick<TranslationRecord, "sourceText">) =>
  record.sourceText.trim().length > 0;
