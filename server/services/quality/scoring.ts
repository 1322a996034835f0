import type { QualityCriteria } from "../../config/pipelineConfig";
import type {
  DimensionScores,
  QualityEvaluation,
  QualityStatus,
} from "../../models/QualityEvaluation";
import { QualityEvaluationError } from "../errors";

const clamp = (value: number) => Math.max(0, Math.min(100, value));

const roundTo2 = (value: number) => Math.round(value * 100) / 100;

// float error in weighted sums, e.g. 0.7 * 100 = 70.00000000000001
const SCORE_EPSILON = 1e-9;

/** One decimal, the way scores are shown in notes and comments. */
export const formatScore = (score: number): string => score.toFixed(1);

/** Compares the unrounded weighted score; rounding is for display only. */
export function deriveStatus(
  score: number,
  dimensionScores: Readonly<DimensionScores>,
  criteria: QualityCriteria,
): { status: QualityStatus; failedCriticalDimensions: string[] } {
  const { approve, reject, criticalFloor } = criteria.thresholds;
  const critical = criteria.dimensions.filter((dim) => dim.critical);
  const failedCriticalDimensions = critical
    .filter((dim) => (dimensionScores[dim.name] ?? 0) < dim.minimum)
    .map((dim) => dim.name);

  const belowFloor = critical.some(
    (dim) => (dimensionScores[dim.name] ?? 0) < criticalFloor,
  );
  if (score < reject - SCORE_EPSILON || belowFloor) {
    return { status: "rejected", failedCriticalDimensions };
  }
  if (score >= approve - SCORE_EPSILON && failedCriticalDimensions.length === 0) {
    return { status: "approved", failedCriticalDimensions };
  }
  return { status: "needs_review", failedCriticalDimensions };
}

/**
 * Turns raw dimension scores into an evaluation. Pure: the same scores and
 * criteria always give the same result. Dimensions that are not configured
 * are dropped.
 */
export function scoreDimensions(
  scores: Readonly<Record<string, number>>,
  criteria: QualityCriteria,
): QualityEvaluation {
  const missing = criteria.dimensions
    .filter((dim) => typeof scores[dim.name] !== "number" || !Number.isFinite(scores[dim.name]))
    .map((dim) => dim.name);
  if (missing.length) {
    throw new QualityEvaluationError(`Missing dimension scores: ${missing.join(", ")}`);
  }

  const dimensionScores: DimensionScores = {};
  let total = 0;
  for (const dim of criteria.dimensions) {
    const value = clamp(scores[dim.name]);
    dimensionScores[dim.name] = value;
    total += value * dim.weight;
  }

  const score = clamp(total);
  const weightedScore = roundTo2(score);
  const { status, failedCriticalDimensions } = deriveStatus(
    score,
    dimensionScores,
    criteria,
  );

  return Object.freeze({
    dimensionScores: Object.freeze(dimensionScores),
    weightedScore,
    status,
    failedCriticalDimensions: Object.freeze(failedCriticalDimensions),
  });
}
