import type { ExchangeNote, ExchangeNoteKey, XliffVersion } from "../../models/ExchangeDocument";

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export const XLIFF_NAMESPACES: Record<XliffVersion, string> = {
  "1.2": "urn:oasis:names:tc:xliff:document:1.2",
  "2.0": "urn:oasis:names:tc:xliff:document:2.0",
};

export const NOTE_KEYS: readonly ExchangeNoteKey[] = [
  "external_ref",
  "category",
  "max_length",
  "lqa_score",
  "lqa_status",
];

const NOTE_KEY_SET = new Set<string>(NOTE_KEYS);

/** Legacy notes carry their key inline as "key: value". */
export const encodeLegacyNote = (note: ExchangeNote): string =>
  note.key ? `${note.key}: ${note.value}` : note.value;

export function decodeLegacyNote(text: string): ExchangeNote {
  const separator = text.indexOf(": ");
  if (separator > 0) {
    const key = text.slice(0, separator);
    if (NOTE_KEY_SET.has(key)) {
      return { key, value: text.slice(separator + 2) };
    }
  }
  return { key: null, value: text };
}
