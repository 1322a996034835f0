import fs from "node:fs/promises";
import path from "node:path";

import { XMLBuilder } from "fast-xml-parser";

import type {
  ExchangeDocument,
  ExchangeNote,
  ExchangeUnit,
  XliffVersion,
} from "../../models/ExchangeDocument";
import type { QualityEvaluation } from "../../models/QualityEvaluation";
import type { TranslationRecord } from "../../models/TranslationRecord";
import type { TranslationResult } from "../../models/TranslationResult";
import { SchemaError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { formatScore } from "../quality/scoring";
import { encodeLegacyNote, XLIFF_NAMESPACES, XML_DECLARATION } from "./xliffFormat";

export const DEFAULT_XLIFF_VERSION: XliffVersion = "1.2";
const DEFAULT_ORIGINAL = "translations";

export interface ExchangeDocumentInput {
  records: readonly TranslationRecord[];
  /** Paired with `records` by position. */
  translations: readonly TranslationResult[];
  sourceLang: string;
  targetLang: string;
  version?: XliffVersion;
  /** Paired by position; a null entry adds no LQA notes to its unit. */
  evaluations?: readonly (QualityEvaluation | null)[] | null;
  original?: string | null;
}

type XmlNode = Record<string, unknown>;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  format: true,
  indentBy: "  ",
  suppressEmptyNode: false,
});

function buildNotes(
  record: TranslationRecord,
  evaluation: QualityEvaluation | null | undefined,
): ExchangeNote[] {
  const notes: ExchangeNote[] = [{ key: "external_ref", value: record.externalRef }];
  if (record.category?.trim()) {
    notes.push({ key: "category", value: record.category });
  }
  if (record.maxLength !== null) {
    notes.push({ key: "max_length", value: String(record.maxLength) });
  }
  if (evaluation) {
    notes.push({ key: "lqa_score", value: formatScore(evaluation.weightedScore) });
    notes.push({ key: "lqa_status", value: evaluation.status });
  }
  return notes;
}

export function buildExchangeDocument(input: ExchangeDocumentInput): ExchangeDocument {
  const { records, translations, evaluations } = input;
  if (records.length !== translations.length) {
    throw new SchemaError(
      `Got ${translations.length} translation(s) for ${records.length} record(s)`,
    );
  }
  if (evaluations && evaluations.length !== records.length) {
    throw new SchemaError(
      `Got ${evaluations.length} evaluation(s) for ${records.length} record(s)`,
    );
  }

  const units: ExchangeUnit[] = records.map((record, index) => ({
    id: String(record.id),
    name: record.displayKey,
    source: record.sourceText,
    // failure markers are kept so reviewers see which records failed
    target: translations[index].translatedText,
    notes: buildNotes(record, evaluations?.[index]),
  }));

  return {
    version: input.version ?? DEFAULT_XLIFF_VERSION,
    sourceLang: input.sourceLang,
    targetLang: input.targetLang,
    original: input.original ?? null,
    units,
  };
}

function legacyTree(doc: ExchangeDocument): XmlNode {
  const transUnits = doc.units.map((unit) => {
    const node: XmlNode = { "@_id": unit.id };
    if (unit.name !== null) node["@_resname"] = unit.name;
    node.source = unit.source;
    if (unit.target !== null) node.target = unit.target;
    if (unit.notes.length) node.note = unit.notes.map(encodeLegacyNote);
    return node;
  });

  return {
    xliff: {
      "@_version": "1.2",
      "@_xmlns": XLIFF_NAMESPACES["1.2"],
      file: {
        "@_source-language": doc.sourceLang,
        "@_target-language": doc.targetLang,
        "@_datatype": "plaintext",
        "@_original": doc.original ?? DEFAULT_ORIGINAL,
        body: transUnits.length ? { "trans-unit": transUnits } : "",
      },
    },
  };
}

function modernTree(doc: ExchangeDocument): XmlNode {
  const units = doc.units.map((unit) => {
    const node: XmlNode = { "@_id": unit.id };
    if (unit.name !== null) node["@_name"] = unit.name;
    if (unit.notes.length) {
      node.notes = {
        note: unit.notes.map((note) =>
          note.key ? { "@_category": note.key, "#text": note.value } : note.value,
        ),
      };
    }
    const segment: XmlNode = { source: unit.source };
    if (unit.target !== null) segment.target = unit.target;
    node.segment = segment;
    return node;
  });

  const file: XmlNode = { "@_id": "f1" };
  if (doc.original !== null) file["@_original"] = doc.original;
  if (units.length) file.unit = units;

  return {
    xliff: {
      "@_version": "2.0",
      "@_xmlns": XLIFF_NAMESPACES["2.0"],
      "@_srcLang": doc.sourceLang,
      "@_trgLang": doc.targetLang,
      file,
    },
  };
}

export function serializeExchangeDocument(doc: ExchangeDocument): string {
  const tree = doc.version === "2.0" ? modernTree(doc) : legacyTree(doc);
  const body: string = builder.build(tree);
  return `${XML_DECLARATION}\n${body}`;
}

export const generateExchangeXml = (input: ExchangeDocumentInput): string =>
  serializeExchangeDocument(buildExchangeDocument(input));

export async function writeExchangeFile(
  outputPath: string,
  input: ExchangeDocumentInput,
  logger: Logger = createLogger("xliff-generator"),
): Promise<string> {
  const xml = generateExchangeXml(input);
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.writeFile(outputPath, xml, "utf8");
  logger.info(
    { outputPath, version: input.version ?? DEFAULT_XLIFF_VERSION, units: input.records.length },
    "Wrote exchange document",
  );
  return outputPath;
}
