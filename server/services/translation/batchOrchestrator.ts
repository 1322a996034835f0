import pLimit from "p-limit";

import type {
  TranslationClient,
  TranslationOutcome,
} from "../../agents/translation/types";
import { hasSourceText, type TranslationRecord } from "../../models/TranslationRecord";
import {
  buildFailedResult,
  type TranslationResult,
  type TranslationsByLanguage,
} from "../../models/TranslationResult";
import {
  ConfigError,
  describeError,
  SchemaError,
  TranslationFailure,
  type PipelineWarning,
} from "../errors";
import { createLogger, type Logger } from "../logger";

export const DEFAULT_BATCH_SIZE = 50;

export interface LanguageStats {
  total: number;
  completed: number;
  failed: number;
  truncated: number;
  cancelled: boolean;
}

export type TranslationJobEvent =
  | { type: "language-start"; targetLang: string; total: number }
  | {
      type: "progress";
      targetLang: string;
      completed: number;
      failed: number;
      total: number;
    }
  | {
      type: "record-failed";
      targetLang: string;
      recordId: number;
      message: string;
    }
  | { type: "language-complete"; targetLang: string; stats: LanguageStats }
  | {
      type: "job-complete";
      stats: Record<string, LanguageStats>;
      cancelled: boolean;
    };

export interface TranslationJobListeners {
  onEvent?(event: TranslationJobEvent): void | Promise<void>;
}

export interface TranslationJobOptions {
  sourceLang: string;
  targetLangs: readonly string[];
  /** Progress granularity; has no effect on the results. */
  batchSize?: number;
  /** How many target languages are translated at the same time. */
  concurrency?: number;
  signal?: AbortSignal;
  listeners?: TranslationJobListeners;
  logger?: Logger;
}

export interface TranslationJobResult {
  results: TranslationsByLanguage;
  stats: Record<string, LanguageStats>;
  warnings: PipelineWarning[];
  cancelled: boolean;
}

interface LanguageRun {
  targetLang: string;
  results: TranslationResult[];
  stats: LanguageStats;
  warnings: PipelineWarning[];
}

const positiveInteger = (value: number | undefined, fallback: number, label: string) => {
  const resolved = value ?? fallback;
  if (!Number.isInteger(resolved) || resolved < 1) {
    throw new ConfigError(`${label} must be a positive integer, got ${resolved}`);
  }
  return resolved;
};

async function emit(
  listeners: TranslationJobListeners | undefined,
  event: TranslationJobEvent,
  logger: Logger,
): Promise<void> {
  if (!listeners?.onEvent) return;
  try {
    await listeners.onEvent(event);
  } catch (error) {
    logger.error({ err: error, event: event.type }, "Translation job listener failed");
  }
}

async function translateRecord(
  client: TranslationClient,
  record: TranslationRecord,
  sourceLang: string,
  targetLang: string,
): Promise<TranslationOutcome> {
  try {
    return await client.translate({
      text: record.sourceText,
      sourceLang,
      targetLang,
      context: record.category,
      maxLength: record.maxLength,
      category: record.category,
    });
  } catch (error) {
    // clients should not throw, but one that does still only fails this record
    return {
      ok: false,
      error:
        error instanceof TranslationFailure
          ? error
          : new TranslationFailure(describeError(error), { cause: error }),
    };
  }
}

async function runLanguage(
  records: readonly TranslationRecord[],
  targetLang: string,
  client: TranslationClient,
  context: {
    sourceLang: string;
    batchSize: number;
    signal?: AbortSignal;
    listeners?: TranslationJobListeners;
    logger: Logger;
  },
): Promise<LanguageRun> {
  const { sourceLang, batchSize, signal, listeners, logger } = context;
  const results: TranslationResult[] = [];
  const warnings: PipelineWarning[] = [];
  const stats: LanguageStats = {
    total: records.length,
    completed: 0,
    failed: 0,
    truncated: 0,
    cancelled: false,
  };

  logger.info({ targetLang, records: records.length }, "Starting translation");
  await emit(listeners, { type: "language-start", targetLang, total: records.length }, logger);

  for (const record of records) {
    if (signal?.aborted) {
      stats.cancelled = true;
      break;
    }

    const outcome = await translateRecord(client, record, sourceLang, targetLang);
    if (outcome.ok) {
      results.push(outcome.result);
      for (const warning of outcome.warnings) {
        warnings.push({ ...warning, recordId: record.id });
        stats.truncated += 1;
      }
    } else {
      const message = outcome.error.message;
      logger.error({ recordId: record.id, targetLang, err: outcome.error }, "Failed to translate record");
      results.push(
        buildFailedResult({
          sourceText: record.sourceText,
          sourceLang,
          targetLang,
          category: record.category,
          reason: message,
        }),
      );
      warnings.push({
        kind: "translation_failed",
        recordId: record.id,
        targetLang,
        message: `Record ${record.id} failed: ${message}`,
      });
      stats.failed += 1;
      await emit(listeners, { type: "record-failed", targetLang, recordId: record.id, message }, logger);
    }
    stats.completed += 1;

    if (stats.completed % batchSize === 0 && stats.completed < records.length) {
      await emit(
        listeners,
        { type: "progress", targetLang, completed: stats.completed, failed: stats.failed, total: records.length },
        logger,
      );
    }
  }

  await emit(
    listeners,
    { type: "progress", targetLang, completed: stats.completed, failed: stats.failed, total: records.length },
    logger,
  );
  await emit(listeners, { type: "language-complete", targetLang, stats: { ...stats } }, logger);
  logger.info(
    { targetLang, completed: stats.completed, failed: stats.failed, cancelled: stats.cancelled },
    "Completed translation",
  );
  return { targetLang, results, stats, warnings };
}

/**
 * Translates every record into every target language. A failed record turns
 * into a failure result in its slot; it never aborts the job.
 */
export async function runTranslationJob(
  records: readonly TranslationRecord[],
  client: TranslationClient,
  options: TranslationJobOptions,
): Promise<TranslationJobResult> {
  const logger = options.logger ?? createLogger("batch-orchestrator");
  const batchSize = positiveInteger(options.batchSize, DEFAULT_BATCH_SIZE, "batchSize");
  const concurrency = positiveInteger(options.concurrency, 1, "concurrency");

  const emptyIds = records.filter((record) => !hasSourceText(record)).map((record) => record.id);
  if (emptyIds.length) {
    throw new SchemaError(
      `Records with empty source text cannot be translated: ${emptyIds.join(", ")}`,
    );
  }

  const targetLangs = [...new Set(options.targetLangs)];
  const snapshot = Object.freeze([...records]);
  const limit = pLimit(concurrency);

  const runs = await Promise.all(
    targetLangs.map((targetLang) =>
      limit(() =>
        runLanguage(snapshot, targetLang, client, {
          sourceLang: options.sourceLang,
          batchSize,
          signal: options.signal,
          listeners: options.listeners,
          logger,
        }),
      ),
    ),
  );

  const results: TranslationsByLanguage = {};
  const stats: Record<string, LanguageStats> = {};
  const warnings: PipelineWarning[] = [];
  for (const run of runs) {
    results[run.targetLang] = run.results;
    stats[run.targetLang] = run.stats;
    warnings.push(...run.warnings);
  }
  const cancelled = Boolean(options.signal?.aborted) || runs.some((run) => run.stats.cancelled);

  await emit(options.listeners, { type: "job-complete", stats, cancelled }, logger);
  return { results, stats, warnings, cancelled };
}
