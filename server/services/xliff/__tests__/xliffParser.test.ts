import { describe, test } from "node:test";
import assert from "node:assert/strict";

import { ExchangeFormatError } from "../../errors";
import { makeRecord, makeResult } from "../../__tests__/pipelineFixtures";
import { generateExchangeXml } from "../xliffGenerator";
import { parseExchangeDocument, validateExchangeXml } from "../xliffParser";

const REVIEWED_LEGACY = `<?xml version="1.0" encoding="UTF-8"?>
<xliff version="1.2" xmlns="urn:oasis:names:tc:xliff:document:1.2">
  <file source-language="en" target-language="ja-JP" datatype="plaintext" original="strings.csv">
    <body>
      <trans-unit id="1" resname="Save Button">
        <source>Save</source>
        <target>保存</target>
        <note>external_ref: ext-1</note>
        <note>Reviewer: shorter please</note>
      </trans-unit>
      <trans-unit id="2">
        <source>Cancel</source>
      </trans-unit>
    </body>
  </file>
</xliff>
`;

const SEGMENTED = `<xliff version="2.0" xmlns="urn:oasis:names:tc:xliff:document:2.0" srcLang="en" trgLang="fr-FR">
  <file id="f1">
    <unit id="7" name="Intro">
      <notes><note category="category">ui</note><note>free text</note></notes>
      <segment><source>Hello. </source><target>Bonjour. </target></segment>
      <segment><source>Bye.</source></segment>
    </unit>
  </file>
</xliff>`;

const expectFormatError = (pattern: RegExp) => (error: unknown) => {
  assert.ok(error instanceof ExchangeFormatError);
  assert.match(error.message, pattern);
  return true;
};

describe("parseExchangeDocument", () => {
  test("reads legacy units, keyed notes and reviewer notes", () => {
    assert.deepEqual(parseExchangeDocument(REVIEWED_LEGACY), {
      version: "1.2",
      sourceLang: "en",
      targetLang: "ja-JP",
      original: "strings.csv",
      units: [
        {
          id: "1",
          name: "Save Button",
          source: "Save",
          target: "保存",
          notes: [
            { key: "external_ref", value: "ext-1" },
            { key: null, value: "Reviewer: shorter please" },
          ],
        },
        { id: "2", name: null, source: "Cancel", target: null, notes: [] },
      ],
    });
  });

  test("joins the segments of a segmented unit", () => {
    assert.deepEqual(parseExchangeDocument(SEGMENTED), {
      version: "2.0",
      sourceLang: "en",
      targetLang: "fr-FR",
      original: null,
      units: [
        {
          id: "7",
          name: "Intro",
          source: "Hello. Bye.",
          target: "Bonjour. ",
          notes: [
            { key: "category", value: "ui" },
            { key: null, value: "free text" },
          ],
        },
      ],
    });
  });

  test("keeps the text of inline markup in document order", () => {
    const legacy = parseExchangeDocument(
      '<xliff version="1.2" xmlns="urn:oasis:names:tc:xliff:document:1.2">' +
        '<file source-language="en" target-language="zh-CN"><body>' +
        '<trans-unit id="1"><source>Hello <g id="1">world</g><x id="2"/>!</source>' +
        '<target>你好 <g id="1">世界</g>!</target></trans-unit>' +
        "</body></file></xliff>",
    );
    assert.equal(legacy.units[0].source, "Hello world!");
    assert.equal(legacy.units[0].target, "你好 世界!");

    const modern = parseExchangeDocument(
      '<xliff version="2.0" xmlns="urn:oasis:names:tc:xliff:document:2.0" srcLang="en" trgLang="fr-FR">' +
        '<file id="f1"><unit id="3"><segment>' +
        '<source>Press <pc id="1">Save</pc> now</source>' +
        '<target>Appuyez sur <pc id="1">Enregistrer</pc><ph id="2"/> maintenant</target>' +
        "</segment></unit></file></xliff>",
    );
    assert.equal(modern.units[0].source, "Press Save now");
    assert.equal(modern.units[0].target, "Appuyez sur Enregistrer maintenant");
  });

  test("rejects documents it cannot read", () => {
    assert.throws(() => parseExchangeDocument('<xliff version="1.2"><file>'), expectFormatError(/^Malformed XML at line 1: /));
    assert.throws(() => parseExchangeDocument("<root/>"), expectFormatError(/^Exchange document has no <xliff> root element$/));
    assert.throws(
      () => parseExchangeDocument('<xliff version="3.0"></xliff>'),
      expectFormatError(/^Unsupported XLIFF version: 3\.0$/),
    );
    assert.throws(
      () => parseExchangeDocument('<xliff version="1.2"></xliff>'),
      expectFormatError(/^Exchange document has no <file> element$/),
    );
    assert.throws(
      () =>
        parseExchangeDocument(
          '<xliff version="2.0"><file id="f1"><unit><segment><source>a</source></segment></unit></file></xliff>',
        ),
      expectFormatError(/^unit is missing its id attribute$/),
    );
  });
});

describe("validateExchangeXml", () => {
  test("accepts generated documents and checks the expected version", () => {
    const xml = generateExchangeXml({
      records: [makeRecord()],
      translations: [makeResult()],
      sourceLang: "en",
      targetLang: "zh-CN",
    });

    assert.deepEqual(validateExchangeXml(xml), {
      valid: true,
      version: "1.2",
      unitCount: 1,
      errors: [],
      warnings: [],
    });
    assert.deepEqual(validateExchangeXml(xml, "2.0").errors, ["Expected XLIFF 2.0, found 1.2"]);
  });

  test("warns about namespaces, duplicate ids and missing targets", () => {
    const result = validateExchangeXml(
      '<xliff version="1.2"><file source-language="en" target-language="ja-JP"><body>' +
        '<trans-unit id="1"><source>a</source></trans-unit>' +
        '<trans-unit id="1"><source>b</source><target>B</target></trans-unit>' +
        "</body></file></xliff>",
    );
    assert.equal(result.valid, true);
    assert.equal(result.unitCount, 2);
    assert.deepEqual(result.warnings, [
      "Namespace does not match XLIFF 1.2",
      "Unit 1 has no target",
      "Duplicate unit id 1",
    ]);
  });

  test("reports missing languages and empty documents as errors", () => {
    const result = validateExchangeXml(
      '<xliff version="2.0" xmlns="urn:oasis:names:tc:xliff:document:2.0"><file id="f1"></file></xliff>',
    );
    assert.deepEqual(result.errors, [
      "Exchange document contains no translation units",
      "Source language is not declared",
      "Target language is not declared",
    ]);
    assert.equal(result.valid, false);
  });

  test("turns unreadable XML into an invalid result", () => {
    const result = validateExchangeXml("not xml at all <");
    assert.equal(result.valid, false);
    assert.equal(result.version, null);
    assert.equal(result.errors.length, 1);
  });
});
