export const XLIFF_VERSIONS = ["1.2", "2.0"] as const;

/** "1.2" is the legacy flat layout, "2.0" the segmented one. */
export type XliffVersion = (typeof XLIFF_VERSIONS)[number];

export const isXliffVersion = (value: string): value is XliffVersion =>
  (XLIFF_VERSIONS as readonly string[]).includes(value);

export type ExchangeNoteKey =
  | "external_ref"
  | "category"
  | "max_length"
  | "lqa_score"
  | "lqa_status";

export interface ExchangeNote {
  /** Null for free-text notes added by a reviewer. */
  key: string | null;
  value: string;
}

export interface ExchangeUnit {
  id: string;
  name: string | null;
  source: string;
  /** Null when the unit carries no target element. */
  target: string | null;
  notes: ExchangeNote[];
}

export interface ExchangeDocument {
  version: XliffVersion;
  sourceLang: string;
  targetLang: string;
  original: string | null;
  units: ExchangeUnit[];
}

export const findNote = (unit: ExchangeUnit, key: ExchangeNoteKey): string | undefined =>
  unit.notes.find((note) => note.key === key)?.value;
