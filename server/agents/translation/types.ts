import type { TranslationFailure, LengthConstraintWarning } from "../../services/errors";
import type { TranslationResult } from "../../models/TranslationResult";

export interface TranslationRequest {
  text: string;
  sourceLang: string;
  targetLang: string;
  /** Free-form surrounding context shown to the model. */
  context?: string | null;
  maxLength?: number | null;
  category?: string | null;
}

export type TranslationOutcome =
  | {
      ok: true;
      result: TranslationResult;
      warnings: LengthConstraintWarning[];
    }
  | {
      ok: false;
      error: TranslationFailure;
    };

/**
 * Boundary to the translation provider. Implementations report provider
 * errors as `ok: false` outcomes instead of throwing.
 */
export interface TranslationClient {
  translate(request: TranslationRequest): Promise<TranslationOutcome>;
  /** Same values as calling `translate` once per request, in order. */
  translateBatch(requests: readonly TranslationRequest[]): Promise<TranslationOutcome[]>;
}

export async function translateSequentially(
  client: Pick<TranslationClient, "translate">,
  requests: readonly TranslationRequest[],
): Promise<TranslationOutcome[]> {
  const outcomes: TranslationOutcome[] = [];
  for (const request of requests) {
    outcomes.push(await client.translate(request));
  }
  return outcomes;
}
