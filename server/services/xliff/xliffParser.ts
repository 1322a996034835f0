import fs from "node:fs/promises";

import { XMLParser, XMLValidator } from "fast-xml-parser";

import {
  isXliffVersion,
  type ExchangeDocument,
  type ExchangeNote,
  type ExchangeUnit,
  type XliffVersion,
} from "../../models/ExchangeDocument";
import { ExchangeFormatError } from "../errors";
import { decodeLegacyNote, XLIFF_NAMESPACES } from "./xliffFormat";

type XmlNode = Record<string, unknown>;

/** Element with its children in document order; text children are plain strings. */
interface XmlElement {
  name: string;
  attrs: Record<string, string>;
  children: XmlChild[];
}

type XmlChild = XmlElement | string;

const ATTRIBUTE_PREFIX = "@_";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: "#text",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  preserveOrder: true,
});

const isNode = (value: unknown): value is XmlNode =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readAttrs = (value: unknown): Record<string, string> => {
  const attrs: Record<string, string> = {};
  if (!isNode(value)) return attrs;
  for (const [key, attrValue] of Object.entries(value)) {
    if (key.startsWith(ATTRIBUTE_PREFIX) && typeof attrValue === "string") {
      attrs[key.slice(ATTRIBUTE_PREFIX.length)] = attrValue;
    }
  }
  return attrs;
};

// preserveOrder output: [{ tag: [...children], ":@": { attrs } }, { "#text": "..." }]
function toChildren(nodes: unknown): XmlChild[] {
  if (!Array.isArray(nodes)) return [];
  const children: XmlChild[] = [];
  for (const node of nodes) {
    if (!isNode(node)) continue;
    for (const [key, value] of Object.entries(node)) {
      if (key === ":@") continue;
      if (key === "#text") {
        children.push(typeof value === "string" ? value : String(value));
        continue;
      }
      children.push({ name: key, attrs: readAttrs(node[":@"]), children: toChildren(value) });
    }
  }
  return children;
}

const elements = (parent: XmlElement, name: string): XmlElement[] =>
  parent.children.filter((child): child is XmlElement => typeof child !== "string" && child.name === name);

const firstElement = (parent: XmlElement, name: string): XmlElement | null =>
  elements(parent, name)[0] ?? null;

const attr = (element: XmlElement, name: string): string | null => element.attrs[name] ?? null;

/**
 * All descendant text in document order, so inline markup such as
 * `<g>` or `<mrk>` keeps its content in place. Empty placeholders
 * (`<x/>`, `<ph/>`) contribute nothing.
 */
const textContent = (element: XmlElement): string =>
  element.children
    .map((child) => (typeof child === "string" ? child : textContent(child)))
    .join("");

const optionalText = (element: XmlElement | null): string | null =>
  element ? textContent(element) : null;

function parseLegacyUnit(element: XmlElement): ExchangeUnit {
  const id = attr(element, "id");
  if (id === null) {
    throw new ExchangeFormatError("trans-unit is missing its id attribute");
  }
  const notes: ExchangeNote[] = elements(element, "note").map((note) => decodeLegacyNote(textContent(note)));
  return {
    id,
    name: attr(element, "resname"),
    source: optionalText(firstElement(element, "source")) ?? "",
    target: optionalText(firstElement(element, "target")),
    notes,
  };
}

function parseModernUnit(element: XmlElement): ExchangeUnit {
  const id = attr(element, "id");
  if (id === null) {
    throw new ExchangeFormatError("unit is missing its id attribute");
  }
  const notesBlock = firstElement(element, "notes");
  const notes: ExchangeNote[] = notesBlock
    ? elements(notesBlock, "note").map((note) => ({
        key: attr(note, "category"),
        value: textContent(note),
      }))
    : [];

  const segments = elements(element, "segment");
  const targets = segments.map((segment) => optionalText(firstElement(segment, "target")));
  return {
    id,
    name: attr(element, "name"),
    source: segments.map((segment) => optionalText(firstElement(segment, "source")) ?? "").join(""),
    target: targets.every((target) => target === null)
      ? null
      : targets.map((target) => target ?? "").join(""),
    notes,
  };
}

function readRoot(xml: string): { root: XmlElement; version: XliffVersion } {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ExchangeFormatError(`Malformed XML at line ${line}: ${msg}`);
  }
  const tree: unknown = parser.parse(xml);
  const topLevel = toChildren(tree).filter((child): child is XmlElement => typeof child !== "string");
  if (!topLevel.length) {
    throw new ExchangeFormatError("Exchange document has no root element");
  }
  const root = topLevel.find((element) => element.name === "xliff");
  if (!root) {
    throw new ExchangeFormatError("Exchange document has no <xliff> root element");
  }
  const version = attr(root, "version");
  if (version === null || !isXliffVersion(version)) {
    throw new ExchangeFormatError(`Unsupported XLIFF version: ${version ?? "(none)"}`);
  }
  return { root, version };
}

function readDocument(xml: string): { doc: ExchangeDocument; root: XmlElement } {
  const { root, version } = readRoot(xml);
  const files = elements(root, "file");
  if (!files.length) {
    throw new ExchangeFormatError("Exchange document has no <file> element");
  }
  const first = files[0];

  if (version === "1.2") {
    const units = files.flatMap((file) =>
      elements(file, "body").flatMap((body) => elements(body, "trans-unit").map(parseLegacyUnit)),
    );
    return {
      root,
      doc: {
        version,
        sourceLang: attr(first, "source-language") ?? "",
        targetLang: attr(first, "target-language") ?? "",
        original: attr(first, "original"),
        units,
      },
    };
  }

  const units = files.flatMap((file) => elements(file, "unit").map(parseModernUnit));
  return {
    root,
    doc: {
      version,
      sourceLang: attr(root, "srcLang") ?? "",
      targetLang: attr(root, "trgLang") ?? "",
      original: attr(first, "original"),
      units,
    },
  };
}

export function parseExchangeDocument(xml: string): ExchangeDocument {
  return readDocument(xml).doc;
}

export async function readExchangeFile(filePath: string): Promise<ExchangeDocument> {
  return parseExchangeDocument(await fs.readFile(filePath, "utf8"));
}

export interface ExchangeValidationResult {
  valid: boolean;
  version: XliffVersion | null;
  unitCount: number;
  errors: string[];
  warnings: string[];
}

export function validateExchangeXml(
  xml: string,
  expectedVersion?: XliffVersion,
): ExchangeValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  let doc: ExchangeDocument;
  let root: XmlElement;
  try {
    ({ doc, root } = readDocument(xml));
  } catch (error) {
    if (error instanceof ExchangeFormatError) {
      return { valid: false, version: null, unitCount: 0, errors: [error.message], warnings };
    }
    throw error;
  }

  if (expectedVersion && doc.version !== expectedVersion) {
    errors.push(`Expected XLIFF ${expectedVersion}, found ${doc.version}`);
  }
  if (!doc.units.length) {
    errors.push("Exchange document contains no translation units");
  }
  if (!doc.sourceLang) errors.push("Source language is not declared");
  if (!doc.targetLang) errors.push("Target language is not declared");

  if (attr(root, "xmlns") !== XLIFF_NAMESPACES[doc.version]) {
    warnings.push(`Namespace does not match XLIFF ${doc.version}`);
  }

  const seen = new Set<string>();
  for (const unit of doc.units) {
    if (seen.has(unit.id)) warnings.push(`Duplicate unit id ${unit.id}`);
    seen.add(unit.id);
    if (unit.target === null) warnings.push(`Unit ${unit.id} has no target`);
  }

  return {
    valid: errors.length === 0,
    version: doc.version,
    unitCount: doc.units.length,
    errors,
    warnings,
  };
}
