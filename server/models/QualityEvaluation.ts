export type QualityStatus = "approved" | "needs_review" | "rejected";

export const QUALITY_STATUSES: readonly QualityStatus[] = [
  "approved",
  "needs_review",
  "rejected",
];

export type DimensionScores = Record<string, number>;

export interface QualityEvaluation {
  dimensionScores: Readonly<DimensionScores>;
  weightedScore: number;
  status: QualityStatus;
  /** Critical dimensions that scored below their minimum. */
  failedCriticalDimensions: readonly string[];
}

export interface LqaResultEntry {
  recordId: number;
  displayKey: string;
  sourceText: string;
  translatedText: string;
  evaluation: QualityEvaluation | null;
}

export interface LqaResultFile {
  sourceLang: string;
  targetLang: string;
  generatedAt: string;
  criteria: {
    thresholds: { approve: number; reject: number; criticalFloor: number };
    weights: Record<string, number>;
  };
  entries: LqaResultEntry[];
}
