import fs from "node:fs/promises";
import path from "node:path";

import type { QualityEvaluator } from "../agents/quality/types";
import type { TranslationClient } from "../agents/translation/types";
import {
  requireLanguages,
  type PipelineConfig,
  type QualityCriteria,
} from "../config/pipelineConfig";
import type { ExchangeDocument, XliffVersion } from "../models/ExchangeDocument";
import type { LqaResultFile, QualityEvaluation } from "../models/QualityEvaluation";
import type { TranslationRecord } from "../models/TranslationRecord";
import type { TranslationResult } from "../models/TranslationResult";
import { countWarnings, type PipelineWarning } from "./errors";
import { createLogger, type Logger } from "./logger";
import { buildLqaResultFile, evaluateTranslations, writeLqaResultFile } from "./quality/evaluateTranslations";
import { buildResultRows, writeTable } from "./table/csvTable";
import { partitionTranslatable, type TableRow } from "./table/tableSchema";
import {
  runTranslationJob,
  type LanguageStats,
  type TranslationJobListeners,
} from "./translation/batchOrchestrator";
import {
  buildExchangeDocument,
  DEFAULT_XLIFF_VERSION,
  serializeExchangeDocument,
} from "./xliff/xliffGenerator";

export interface TranslatePipelineInput {
  records: readonly TranslationRecord[];
  config: PipelineConfig;
  client: TranslationClient;
  /** LQA runs only when an evaluator is given. */
  evaluator?: QualityEvaluator | null;
  /** Defaults to `config.quality`; the CLI passes a copy with an overridden approve threshold. */
  criteria?: QualityCriteria;
  sourceLang: string;
  targetLangs: readonly string[];
  version?: XliffVersion;
  batchSize?: number;
  concurrency?: number;
  original?: string | null;
  /** Source table header; result rows keep its columns. */
  header?: readonly string[] | null;
  signal?: AbortSignal;
  listeners?: TranslationJobListeners;
  logger?: Logger;
  now?: () => Date;
}

export interface LanguageOutput {
  targetLang: string;
  /** The records this language's results belong to; shorter than the input when cancelled. */
  records: TranslationRecord[];
  results: TranslationResult[];
  evaluations: (QualityEvaluation | null)[] | null;
  document: ExchangeDocument;
  xml: string;
  lqa: LqaResultFile | null;
}

export interface TranslatePipelineOutput {
  sourceLang: string;
  version: XliffVersion;
  languages: LanguageOutput[];
  /** Records kept out of translation because their source text is empty. */
  rejected: TranslationRecord[];
  stats: Record<string, LanguageStats>;
  warnings: PipelineWarning[];
  cancelled: boolean;
  header: readonly string[] | null;
}

/**
 * Translate, optionally score, and render one exchange document per target
 * language. Unknown languages fail before any provider call.
 */
export async function runTranslatePipeline(
  input: TranslatePipelineInput,
): Promise<TranslatePipelineOutput> {
  const logger = input.logger ?? createLogger("translation-job");
  const { config, sourceLang } = input;
  const version = input.version ?? DEFAULT_XLIFF_VERSION;
  const targetLangs = [...new Set(input.targetLangs)];
  requireLanguages(config, [sourceLang, ...targetLangs]);

  const { accepted, rejected, warnings: rejectWarnings } = partitionTranslatable(input.records);
  const warnings: PipelineWarning[] = [...rejectWarnings];
  for (const warning of rejectWarnings) {
    logger.warn({ warning }, warning.message);
  }

  const job = await runTranslationJob(accepted, input.client, {
    sourceLang,
    targetLangs,
    batchSize: input.batchSize,
    concurrency: input.concurrency,
    signal: input.signal,
    listeners: input.listeners,
    logger,
  });
  warnings.push(...job.warnings);

  const criteria = input.criteria ?? config.quality;
  const languages: LanguageOutput[] = [];
  for (const targetLang of targetLangs) {
    const results = job.results[targetLang] ?? [];
    const records = accepted.slice(0, results.length);

    let evaluations: (QualityEvaluation | null)[] | null = null;
    let lqa: LqaResultFile | null = null;
    if (input.evaluator) {
      const run = await evaluateTranslations(records, results, input.evaluator, criteria, logger);
      evaluations = run.evaluations;
      warnings.push(...run.warnings);
      lqa = buildLqaResultFile({
        records,
        results,
        evaluations,
        criteria,
        sourceLang,
        targetLang,
        now: input.now,
      });
    }

    const document = buildExchangeDocument({
      records,
      translations: results,
      sourceLang,
      targetLang,
      version,
      evaluations,
      original: input.original ?? null,
    });
    languages.push({
      targetLang,
      records,
      results,
      evaluations,
      document,
      xml: serializeExchangeDocument(document),
      lqa,
    });
  }

  logger.info(
    { languages: targetLangs, records: accepted.length, warnings: countWarnings(warnings) },
    "Translation pipeline finished",
  );
  return {
    sourceLang,
    version,
    languages,
    rejected,
    stats: job.stats,
    warnings,
    cancelled: job.cancelled,
    header: input.header ?? null,
  };
}

export const exchangeFileName = (targetLang: string) => `translations_${targetLang}.xliff`;

export const RESULT_TABLE_NAME = "translation_results.csv";

export interface WrittenOutputs {
  exchangeFiles: string[];
  lqaFiles: string[];
  resultTable: string;
}

export async function writePipelineOutputs(
  output: TranslatePipelineOutput,
  config: PipelineConfig,
  outputDir: string,
  logger: Logger = createLogger("translation-job"),
): Promise<WrittenOutputs> {
  const exchangeFiles: string[] = [];
  const lqaFiles: string[] = [];
  await fs.mkdir(outputDir, { recursive: true });

  const rows: TableRow[] = [];
  for (const language of output.languages) {
    const xliffPath = path.join(outputDir, exchangeFileName(language.targetLang));
    await fs.writeFile(xliffPath, language.xml, "utf8");
    exchangeFiles.push(xliffPath);
    if (language.lqa) {
      lqaFiles.push(await writeLqaResultFile(outputDir, language.lqa));
    }
    rows.push(
      ...buildResultRows(
        language.records,
        { [language.targetLang]: language.results },
        config.table,
        output.header,
      ),
    );
  }

  const resultTable = await writeTable(rows, path.join(outputDir, RESULT_TABLE_NAME), logger);
  logger.info({ outputDir, exchangeFiles: exchangeFiles.length }, "Wrote pipeline outputs");
  return { exchangeFiles, lqaFiles, resultTable };
}
