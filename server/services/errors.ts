export type PipelineErrorCode =
  | "schema_error"
  | "config_error"
  | "translation_failure"
  | "exchange_format_error"
  | "tms_error"
  | "quality_evaluation_error";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "PipelineError";
  }
}

/** Required table columns are absent, a row is malformed, or the table is empty. */
export class SchemaError extends PipelineError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super("schema_error", message);
    this.name = "SchemaError";
    this.details = details;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config_error", message, options);
    this.name = "ConfigError";
  }
}

export class TranslationFailure extends PipelineError {
  readonly retryable: boolean;

  constructor(
    message: string,
    options: { cause?: unknown; retryable?: boolean } = {},
  ) {
    super("translation_failure", message, { cause: options.cause });
    this.name = "TranslationFailure";
    this.retryable = options.retryable ?? false;
  }
}

export class ExchangeFormatError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("exchange_format_error", message, options);
    this.name = "ExchangeFormatError";
  }
}

export class TmsError extends PipelineError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super("tms_error", message);
    this.name = "TmsError";
    this.status = status;
  }
}

export class QualityEvaluationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("quality_evaluation_error", message, options);
    this.name = "QualityEvaluationError";
  }
}

export const isPipelineError = (error: unknown): error is PipelineError =>
  error instanceof PipelineError;

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};

export interface DuplicateIdWarning {
  kind: "duplicate_id";
  recordId: number;
  message: string;
}

export interface EmptySourceWarning {
  kind: "empty_source";
  recordId: number | null;
  row: number;
  message: string;
}

export interface LengthConstraintWarning {
  kind: "length_constraint";
  targetLang: string;
  maxLength: number;
  originalLength: number;
  recordId?: number;
  message: string;
}

export interface OrphanUnitWarning {
  kind: "orphan_unit";
  unitId: string;
  targetLang: string;
  message: string;
}

export interface MissingTranslationWarning {
  kind: "missing_translation";
  recordId: number;
  targetLang: string;
  message: string;
}

export interface TranslationFailedWarning {
  kind: "translation_failed";
  recordId: number;
  targetLang: string;
  message: string;
}

export interface QualityUnavailableWarning {
  kind: "quality_unavailable";
  recordId: number;
  targetLang: string;
  message: string;
}

export type PipelineWarning =
  | DuplicateIdWarning
  | EmptySourceWarning
  | LengthConstraintWarning
  | OrphanUnitWarning
  | MissingTranslationWarning
  | TranslationFailedWarning
  | QualityUnavailableWarning;

export type PipelineWarningKind = PipelineWarning["kind"];

export const countWarnings = (
  warnings: readonly PipelineWarning[],
): Partial<Record<PipelineWarningKind, number>> => {
  const counts: Partial<Record<PipelineWarningKind, number>> = {};
  for (const warning of warnings) {
    counts[warning.kind] = (counts[warning.kind] ?? 0) + 1;
  }
  return counts;
};
