export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface TranslationResult {
  sourceText: string;
  translatedText: string;
  sourceLang: string;
  targetLang: string;
  model: string;
  usage: TokenUsage;
  /** ISO-8601; null only on failure results. */
  timestamp: string | null;
  category: string | null;
}

export const FAILED_MODEL = "error";

export const failureMarker = (reason: string) => `[TRANSLATION FAILED: ${reason}]`;

export const isFailedResult = (result: TranslationResult): boolean =>
  result.model === FAILED_MODEL;

export function buildFailedResult(params: {
  sourceText: string;
  sourceLang: string;
  targetLang: string;
  category: string | null;
  reason: string;
}): TranslationResult {
  return {
    sourceText: params.sourceText,
    translatedText: failureMarker(params.reason),
    sourceLang: params.sourceLang,
    targetLang: params.targetLang,
    model: FAILED_MODEL,
    usage: { promptTokens: 0, completionTokens: 0 },
    timestamp: null,
    category: params.category,
  };
}

export type TranslationsByLanguage = Record<string, TranslationResult[]>;
