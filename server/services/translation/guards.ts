import type { LengthConstraintWarning } from "../errors";

const WORD_NORMALIZER = /[^\p{L}\p{N}\s'-]/gu;
const CJK_CHAR = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/u;
const CJK_SPLITTER = /([\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}])/gu;

/** Length in Unicode code points. */
export const codePointLength = (value: string): number => Array.from(value).length;

export interface LengthGuardResult {
  text: string;
  warning: LengthConstraintWarning | null;
}

/**
 * Cuts `text` to `maxLength` code points. Truncation is lossy, so it always
 * comes back with a warning.
 */
export function enforceMaxLength(
  text: string,
  maxLength: number | null | undefined,
  context: { targetLang: string; recordId?: number },
): LengthGuardResult {
  if (typeof maxLength !== "number" || maxLength <= 0) {
    return { text, warning: null };
  }
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return { text, warning: null };
  }
  return {
    text: chars.slice(0, maxLength).join(""),
    warning: {
      kind: "length_constraint",
      targetLang: context.targetLang,
      maxLength,
      originalLength: chars.length,
      ...(context.recordId !== undefined ? { recordId: context.recordId } : {}),
      message: `Translation exceeds max_length (${chars.length} > ${maxLength}); truncated`,
    },
  };
}

/** Strips surrounding double quotes, then single quotes, the way models tend to wrap answers. */
export function stripWrappingQuotes(value: string): string {
  return value.trim().replace(/^"+|"+$/g, "").replace(/^'+|'+$/g, "");
}

export function computeLengthRatio(source: string, target: string): number {
  const safeSource = source && source.trim().length ? codePointLength(source) : 1;
  return target && target.trim().length ? codePointLength(target) / safeSource : 0;
}

export function normalizeForMatch(value: string): string {
  return value
    .toLowerCase()
    .replace(WORD_NORMALIZER, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Whitespace tokens; CJK characters count as tokens of their own. */
export function splitTokens(value: string): string[] {
  const spaced = CJK_CHAR.test(value) ? value.replace(CJK_SPLITTER, " $1 ") : value;
  return spaced.split(/\s+/g).filter(Boolean);
}

export function computeSimilarity(a: string, b: string): number {
  const left = normalizeForMatch(a);
  const right = normalizeForMatch(b);
  if (!left && !right) return 1;
  if (!left || !right) return 0;
  const tokensA = new Set(splitTokens(left));
  const tokensB = new Set(splitTokens(right));
  if (!tokensA.size || !tokensB.size) {
    return 0;
  }

  let matches = 0;
  tokensA.forEach((token) => {
    if (tokensB.has(token)) {
      matches += 1;
    }
  });

  return matches / Math.max(tokensA.size, tokensB.size);
}
