import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { QualityEvaluator } from "../../agents/quality/types";
import { dimensionWeights, type QualityCriteria } from "../../config/pipelineConfig";
import type { LqaResultFile, QualityEvaluation } from "../../models/QualityEvaluation";
import type { TranslationRecord } from "../../models/TranslationRecord";
import { isFailedResult, type TranslationResult } from "../../models/TranslationResult";
import {
  describeError,
  SchemaError,
  type QualityUnavailableWarning,
} from "../errors";
import { createLogger, type Logger } from "../logger";
import { scoreDimensions } from "./scoring";

export interface EvaluationRun {
  /** One entry per record/result pair; null where no score could be produced. */
  evaluations: (QualityEvaluation | null)[];
  warnings: QualityUnavailableWarning[];
}

export async function evaluateTranslations(
  records: readonly TranslationRecord[],
  results: readonly TranslationResult[],
  evaluator: QualityEvaluator,
  criteria: QualityCriteria,
  logger: Logger = createLogger("lqa"),
): Promise<EvaluationRun> {
  if (records.length !== results.length) {
    throw new SchemaError(
      `Cannot evaluate ${results.length} translation(s) against ${records.length} record(s)`,
    );
  }

  const evaluations: (QualityEvaluation | null)[] = [];
  const warnings: QualityUnavailableWarning[] = [];

  for (let index = 0; index < records.length; index += 1) {
    const record = records[index];
    const result = results[index];

    if (isFailedResult(result)) {
      evaluations.push(null);
      warnings.push({
        kind: "quality_unavailable",
        recordId: record.id,
        targetLang: result.targetLang,
        message: `Record ${record.id} was not evaluated: translation failed`,
      });
      continue;
    }

    try {
      const scores = await evaluator.evaluate(
        result.sourceText,
        result.translatedText,
        result.targetLang,
        record.category,
      );
      evaluations.push(scoreDimensions(scores, criteria));
    } catch (error) {
      const message = describeError(error);
      logger.warn({ recordId: record.id, targetLang: result.targetLang, err: error }, "LQA evaluation failed");
      evaluations.push(null);
      warnings.push({
        kind: "quality_unavailable",
        recordId: record.id,
        targetLang: result.targetLang,
        message: `Record ${record.id} was not evaluated: ${message}`,
      });
    }
  }

  const scored = evaluations.filter((entry) => entry !== null).length;
  logger.info({ scored, skipped: evaluations.length - scored }, "Completed LQA evaluation");
  return { evaluations, warnings };
}

export function buildLqaResultFile(params: {
  records: readonly TranslationRecord[];
  results: readonly TranslationResult[];
  evaluations: readonly (QualityEvaluation | null)[];
  criteria: QualityCriteria;
  sourceLang: string;
  targetLang: string;
  now?: () => Date;
}): LqaResultFile {
  const { records, results, evaluations, criteria } = params;
  return {
    sourceLang: params.sourceLang,
    targetLang: params.targetLang,
    generatedAt: (params.now?.() ?? new Date()).toISOString(),
    criteria: {
      thresholds: { ...criteria.thresholds },
      weights: dimensionWeights(criteria),
    },
    entries: records.map((record, index) => ({
      recordId: record.id,
      displayKey: record.displayKey,
      sourceText: record.sourceText,
      translatedText: results[index]?.translatedText ?? "",
      evaluation: evaluations[index] ?? null,
    })),
  };
}

export const lqaResultFileName = (targetLang: string) => `lqa_results_${targetLang}.json`;

export async function writeLqaResultFile(
  outputDir: string,
  file: LqaResultFile,
): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  const target = path.join(outputDir, lqaResultFileName(file.targetLang));
  await fs.writeFile(target, `${JSON.stringify(file, null, 2)}\n`, "utf8");
  return target;
}

const evaluationSchema = z.object({
  dimensionScores: z.record(z.number()),
  weightedScore: z.number(),
  status: z.enum(["approved", "needs_review", "rejected"]),
  failedCriticalDimensions: z.array(z.string()).default([]),
});

const lqaResultFileSchema = z.object({
  sourceLang: z.string(),
  targetLang: z.string(),
  generatedAt: z.string(),
  criteria: z.object({
    thresholds: z.object({
      approve: z.number(),
      reject: z.number(),
      criticalFloor: z.number(),
    }),
    weights: z.record(z.number()),
  }),
  entries: z.array(
    z.object({
      recordId: z.number().int(),
      displayKey: z.string(),
      sourceText: z.string(),
      translatedText: z.string(),
      evaluation: evaluationSchema.nullable(),
    }),
  ),
});

export function parseLqaResultFile(content: string): LqaResultFile {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new SchemaError(`LQA results are not valid JSON: ${describeError(error)}`);
  }
  const parsed = lqaResultFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new SchemaError("LQA results file is malformed", details);
  }
  return parsed.data;
}

export async function readLqaResultFile(filePath: string): Promise<LqaResultFile> {
  return parseLqaResultFile(await fs.readFile(filePath, "utf8"));
}
