import fs from "node:fs/promises";
import path from "node:path";

import type { ExchangeDocument } from "../../models/ExchangeDocument";
import { ExchangeFormatError } from "../errors";
import { computeLengthRatio, computeSimilarity } from "../translation/guards";

export interface UnitComparison {
  unitId: string;
  name: string | null;
  source: string;
  aiText: string;
  humanText: string;
  changed: boolean;
  /** Token overlap between the two targets, 0-1. */
  similarity: number;
  /** Length of the human text relative to the AI text. */
  lengthRatio: number;
}

export interface ReviewComparisonSummary {
  totalUnits: number;
  changedUnits: number;
  unchangedUnits: number;
  modificationRate: number;
  averageSimilarity: number;
  onlyInAi: string[];
  onlyInHuman: string[];
}

export interface ReviewComparison {
  sourceLang: string;
  targetLang: string;
  units: UnitComparison[];
  summary: ReviewComparisonSummary;
}

const round4 = (value: number) => Math.round(value * 10_000) / 10_000;

/** Pairs the units of an AI document and its reviewed copy by unit id. */
export function compareReviewedDocuments(
  ai: ExchangeDocument,
  human: ExchangeDocument,
): ReviewComparison {
  if (ai.targetLang !== human.targetLang) {
    throw new ExchangeFormatError(
      `Cannot compare ${ai.targetLang} against ${human.targetLang}`,
    );
  }

  const humanById = new Map(human.units.map((unit) => [unit.id, unit]));
  const aiIds = new Set(ai.units.map((unit) => unit.id));

  const units: UnitComparison[] = [];
  const onlyInAi: string[] = [];
  for (const unit of ai.units) {
    const reviewed = humanById.get(unit.id);
    if (!reviewed) {
      onlyInAi.push(unit.id);
      continue;
    }
    const aiText = unit.target ?? "";
    const humanText = reviewed.target ?? "";
    units.push({
      unitId: unit.id,
      name: unit.name,
      source: unit.source,
      aiText,
      humanText,
      changed: aiText !== humanText,
      similarity: round4(computeSimilarity(aiText, humanText)),
      lengthRatio: round4(computeLengthRatio(aiText, humanText)),
    });
  }
  const onlyInHuman = human.units.filter((unit) => !aiIds.has(unit.id)).map((unit) => unit.id);

  const changedUnits = units.filter((unit) => unit.changed).length;
  const similarityTotal = units.reduce((sum, unit) => sum + unit.similarity, 0);
  return {
    sourceLang: ai.sourceLang,
    targetLang: ai.targetLang,
    units,
    summary: {
      totalUnits: units.length,
      changedUnits,
      unchangedUnits: units.length - changedUnits,
      modificationRate: units.length ? round4(changedUnits / units.length) : 0,
      averageSimilarity: units.length ? round4(similarityTotal / units.length) : 1,
      onlyInAi,
      onlyInHuman,
    },
  };
}

export const reviewComparisonFileName = (targetLang: string) =>
  `review_comparison_${targetLang}.json`;

export async function writeReviewComparison(
  outputDir: string,
  comparison: ReviewComparison,
): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  const target = path.join(outputDir, reviewComparisonFileName(comparison.targetLang));
  await fs.writeFile(target, `${JSON.stringify(comparison, null, 2)}\n`, "utf8");
  return target;
}
