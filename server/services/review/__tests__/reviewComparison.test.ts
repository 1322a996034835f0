import { describe, test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { ExchangeDocument } from "../../../models/ExchangeDocument";
import { ExchangeFormatError } from "../../errors";
import { compareReviewedDocuments, writeReviewComparison } from "../reviewComparison";

const doc = (targetLang: string, targets: Array<[string, string | null]>): ExchangeDocument => ({
  version: "1.2",
  sourceLang: "en",
  targetLang,
  original: null,
  units: targets.map(([id, target]) => ({ id, name: `key-${id}`, source: `source ${id}`, target, notes: [] })),
});

const ai = doc("zh-CN", [
  ["1", "Save the file now"],
  ["2", "Cancel"],
  ["3", "Delete"],
]);
const human = doc("zh-CN", [
  ["1", "Save the file"],
  ["2", "Cancel"],
  ["4", "New"],
]);

describe("compareReviewedDocuments", () => {
  test("measures how much review changed each unit", () => {
    const comparison = compareReviewedDocuments(ai, human);

    assert.deepEqual(comparison.units, [
      {
        unitId: "1",
        name: "key-1",
        source: "source 1",
        aiText: "Save the file now",
        humanText: "Save the file",
        changed: true,
        similarity: 0.75,
        lengthRatio: 0.7647,
      },
      {
        unitId: "2",
        name: "key-2",
        source: "source 2",
        aiText: "Cancel",
        humanText: "Cancel",
        changed: false,
        similarity: 1,
        lengthRatio: 1,
      },
    ]);
    assert.deepEqual(comparison.summary, {
      totalUnits: 2,
      changedUnits: 1,
      unchangedUnits: 1,
      modificationRate: 0.5,
      averageSimilarity: 0.875,
      onlyInAi: ["3"],
      onlyInHuman: ["4"],
    });
  });

  test("treats documents without shared units as unchanged", () => {
    const { summary } = compareReviewedDocuments(doc("zh-CN", []), doc("zh-CN", []));
    assert.equal(summary.modificationRate, 0);
    assert.equal(summary.averageSimilarity, 1);
  });

  test("refuses to compare different target languages", () => {
    assert.throws(
      () => compareReviewedDocuments(ai, doc("ja-JP", [])),
      (error: unknown) => error instanceof ExchangeFormatError && error.message === "Cannot compare zh-CN against ja-JP",
    );
  });
});

describe("writeReviewComparison", () => {
  test("writes one JSON file per language", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "review-"));
    try {
      const comparison = compareReviewedDocuments(ai, human);
      const target = await writeReviewComparison(dir, comparison);
      assert.equal(path.basename(target), "review_comparison_zh-CN.json");
      assert.deepEqual(JSON.parse(await fs.readFile(target, "utf8")), comparison);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
