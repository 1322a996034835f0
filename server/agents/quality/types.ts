import type { DimensionScores } from "../../models/QualityEvaluation";

/**
 * Boundary to whatever scores a translation. Returns raw 0-100 scores per
 * dimension; weighting and status are derived by `scoreDimensions`.
 */
export interface QualityEvaluator {
  evaluate(
    sourceText: string,
    translatedText: string,
    targetLang: string,
    context?: string | null,
  ): Promise<DimensionScores>;
}
