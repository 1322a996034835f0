#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";

import { Command, InvalidArgumentError, Option } from "commander";

import { loadEnv, requirePhraseCredentials, type AppEnv } from "./config/env";
import {
  loadPipelineConfig,
  withApproveThreshold,
  type PipelineConfig,
} from "./config/pipelineConfig";
import { startServer } from "./index";
import { isXliffVersion, XLIFF_VERSIONS } from "./models/ExchangeDocument";
import { createOpenAiAgentFactory } from "./services/agentFactory";
import {
  ConfigError,
  countWarnings,
  describeError,
  isPipelineError,
  type PipelineWarning,
} from "./services/errors";
import { configureLogger, createLogger } from "./services/logger";
import { readLqaResultFile, lqaResultFileName } from "./services/quality/evaluateTranslations";
import { parseReportFormats, writeLqaReports } from "./services/reports/lqaReport";
import { compareReviewedDocuments, writeReviewComparison } from "./services/review/reviewComparison";
import { readTable, validateTable, writeTable } from "./services/table/csvTable";
import {
  annotationsFromLqaResults,
  PhraseTmsClient,
  type UnitAnnotation,
} from "./services/tms/phraseClient";
import type { TranslationJobEvent } from "./services/translation/batchOrchestrator";
import { runTranslatePipeline, writePipelineOutputs } from "./services/translationJob";
import { importedRecordsToRows, importReviewedDocuments } from "./services/xliff/roundTripImporter";
import { readExchangeFile, validateExchangeXml } from "./services/xliff/xliffParser";

interface GlobalOptions {
  configDir?: string;
  logLevel?: string;
  logFile?: string;
}

const EXCHANGE_EXTENSIONS = new Set([".xliff", ".xlf"]);

const parsePositiveInt = (label: string) => (value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`${label} must be a positive integer.`);
  }
  return parsed;
};

const parseScore = (value: string) => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new InvalidArgumentError("must be a number between 0 and 100.");
  }
  return parsed;
};

const versionOption = () =>
  new Option("--xliff-version <version>", "XLIFF version").choices([...XLIFF_VERSIONS]);

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
    throw error;
  }
}

const print = (line = "") => {
  process.stdout.write(`${line}\n`);
};

function printWarnings(warnings: readonly PipelineWarning[]) {
  if (!warnings.length) return;
  const counts = Object.entries(countWarnings(warnings))
    .map(([kind, count]) => `${kind}=${count}`)
    .join(", ");
  print(`Warnings: ${counts}`);
  for (const warning of warnings.slice(0, 20)) {
    print(`  - ${warning.message}`);
  }
  if (warnings.length > 20) print(`  ... ${warnings.length - 20} more`);
}

interface CommandContext {
  env: AppEnv;
  config: PipelineConfig;
}

async function setup(program: Command): Promise<CommandContext> {
  const options = program.opts<GlobalOptions>();
  const env = loadEnv();
  configureLogger({ level: options.logLevel ?? env.LOG_LEVEL, file: options.logFile });
  const config = await loadPipelineConfig(options.configDir ?? env.TRANSLATION_CONFIG_DIR);
  return { env, config };
}

function describeEvent(event: TranslationJobEvent): string | null {
  switch (event.type) {
    case "language-start":
      return `[${event.targetLang}] translating ${event.total} record(s)`;
    case "progress":
      return `[${event.targetLang}] ${event.completed}/${event.total} done, ${event.failed} failed`;
    case "record-failed":
      return `[${event.targetLang}] record ${event.recordId} failed: ${event.message}`;
    case "language-complete":
    case "job-complete":
      return null;
  }
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("xliff-translator")
    .description("Translate tabular string exports, package them as XLIFF and score translation quality.")
    .version("0.1.0")
    .option("--config-dir <dir>", "directory holding languages.yaml, lqa_criteria.yaml and translation_prompts.yaml")
    .option("--log-level <level>", "log level (fatal, error, warn, info, debug, trace, silent)")
    .option("--log-file <path>", "write logs to this file instead of stdout");

  program
    .command("translate")
    .description("Translate a CSV export into one XLIFF file per target language")
    .requiredOption("-i, --input <path>", "input CSV file")
    .requiredOption("-t, --target-langs <codes...>", "target language codes, e.g. zh-CN ja-JP")
    .requiredOption("-o, --output-dir <dir>", "directory for XLIFF files and reports")
    .option("-s, --source-lang <code>", "source language code", "en")
    .option("--no-lqa", "skip AI quality evaluation")
    .option("--lqa-threshold <score>", "approve threshold (0-100)", parseScore)
    .option("--batch-size <n>", "records per progress report", parsePositiveInt("--batch-size"), 50)
    .option("--concurrency <n>", "target languages translated at the same time", parsePositiveInt("--concurrency"))
    .addOption(versionOption().default("1.2"))
    .action(async (options: {
      input: string;
      targetLangs: string[];
      outputDir: string;
      sourceLang: string;
      lqa: boolean;
      lqaThreshold?: number;
      batchSize: number;
      concurrency?: number;
      xliffVersion: string;
    }) => {
      const { env, config } = await setup(program);
      const version = isXliffVersion(options.xliffVersion) ? options.xliffVersion : "1.2";
      const criteria =
        options.lqaThreshold === undefined
          ? config.quality
          : withApproveThreshold(config.quality, options.lqaThreshold);
      const agents = createOpenAiAgentFactory(env, config);

      const {
        header,
        records,
        warnings: tableWarnings,
      } = await readTable(options.input, config.table);
      print(`Loaded ${records.length} record(s) from ${options.input}`);

      const controller = new AbortController();
      const onSigint = () => {
        print("Cancelling after the records in flight...");
        controller.abort();
      };
      process.once("SIGINT", onSigint);

      try {
        const output = await runTranslatePipeline({
          records,
          header,
          config,
          client: agents.createTranslationClient(),
          evaluator: options.lqa ? agents.createEvaluator() : null,
          criteria,
          sourceLang: options.sourceLang,
          targetLangs: options.targetLangs,
          version,
          batchSize: options.batchSize,
          concurrency: options.concurrency ?? env.LANGUAGE_CONCURRENCY,
          original: path.basename(options.input),
          signal: controller.signal,
          listeners: {
            onEvent: (event) => {
              const line = describeEvent(event);
              if (line) print(line);
            },
          },
        });
        const written = await writePipelineOutputs(output, config, options.outputDir);

        print();
        for (const [lang, stats] of Object.entries(output.stats)) {
          print(`${lang}: ${stats.completed}/${stats.total} translated, ${stats.failed} failed, ${stats.truncated} truncated`);
        }
        for (const file of [...written.exchangeFiles, ...written.lqaFiles, written.resultTable]) {
          print(`Wrote ${file}`);
        }
        printWarnings([...tableWarnings, ...output.warnings]);
        if (output.cancelled) {
          print("Job was cancelled; outputs hold the records processed so far.");
          process.exitCode = 130;
        }
      } finally {
        process.off("SIGINT", onSigint);
      }
    });

  program
    .command("evaluate-review")
    .description("Compare an AI-generated XLIFF with its human-reviewed copy")
    .requiredOption("--ai-xliff <path>", "XLIFF produced by the translate command")
    .requiredOption("--human-xliff <path>", "reviewed XLIFF downloaded from the TMS")
    .requiredOption("-o, --output-dir <dir>", "directory for the comparison report")
    .action(async (options: { aiXliff: string; humanXliff: string; outputDir: string }) => {
      await setup(program);
      const comparison = compareReviewedDocuments(
        await readExchangeFile(options.aiXliff),
        await readExchangeFile(options.humanXliff),
      );
      const target = await writeReviewComparison(options.outputDir, comparison);
      const { summary } = comparison;
      print(`${summary.changedUnits}/${summary.totalUnits} unit(s) changed by review (rate ${summary.modificationRate})`);
      print(`Average similarity: ${summary.averageSimilarity}`);
      if (summary.onlyInAi.length) print(`Missing from reviewed file: ${summary.onlyInAi.join(", ")}`);
      if (summary.onlyInHuman.length) print(`Only in reviewed file: ${summary.onlyInHuman.join(", ")}`);
      print(`Wrote ${target}`);
    });

  program
    .command("upload")
    .description("Upload XLIFF files to Phrase, with LQA scores as key comments")
    .requiredOption("--xliff-dir <dir>", "directory containing XLIFF files")
    .option("--lqa-reports <dir>", "directory containing lqa_results_<lang>.json files")
    .option("--no-comments", "do not add LQA comments")
    .action(async (options: { xliffDir: string; lqaReports?: string; comments: boolean }) => {
      const { env } = await setup(program);
      const client = new PhraseTmsClient({ credentials: requirePhraseCredentials(env) });

      const entries = await fs.readdir(options.xliffDir);
      const files = entries
        .filter((name) => EXCHANGE_EXTENSIONS.has(path.extname(name).toLowerCase()))
        .sort();
      if (!files.length) {
        print(`No XLIFF files found in ${options.xliffDir}`);
        process.exitCode = 1;
        return;
      }

      for (const name of files) {
        const filePath = path.join(options.xliffDir, name);
        const doc = await readExchangeFile(filePath);
        let annotations: UnitAnnotation[] = [];
        if (options.comments && options.lqaReports) {
          const lqaPath = path.join(options.lqaReports, lqaResultFileName(doc.targetLang));
          if (await fileExists(lqaPath)) {
            annotations = annotationsFromLqaResults(await readLqaResultFile(lqaPath));
          }
        }
        const summary = await client.uploadExchangeFile(filePath, doc.targetLang, annotations);
        print(`Uploaded ${name} (${doc.targetLang}): upload ${summary.uploadId}, ${summary.commentsAdded} comment(s)`);
        if (summary.missingKeys.length) {
          print(`  keys not found: ${summary.missingKeys.join(", ")}`);
        }
      }
    });

  program
    .command("download")
    .description("Download a reviewed XLIFF from Phrase")
    .requiredOption("--job-id <id>", "Phrase job id")
    .requiredOption("--locale <code>", "target locale, e.g. zh-CN")
    .requiredOption("-o, --output <path>", "output XLIFF file")
    .action(async (options: { jobId: string; locale: string; output: string }) => {
      const { env } = await setup(program);
      const client = new PhraseTmsClient({ credentials: requirePhraseCredentials(env) });
      const xml = await client.downloadJobLocale(options.jobId, options.locale);
      const check = validateExchangeXml(xml);
      await fs.mkdir(path.dirname(path.resolve(options.output)), { recursive: true });
      await fs.writeFile(options.output, xml, "utf8");
      print(`Wrote ${options.output} (${check.unitCount} unit(s))`);
      if (!check.valid) {
        print(`Downloaded file is not a valid XLIFF document: ${check.errors.join("; ")}`);
        process.exitCode = 1;
      }
    });

  program
    .command("import")
    .description("Merge reviewed XLIFF files back into the original CSV")
    .requiredOption("-x, --xliff-files <paths...>", "reviewed XLIFF files, one per language")
    .requiredOption("-i, --original-csv <path>", "original CSV file")
    .requiredOption("-o, --output <path>", "output CSV with one column per language")
    .action(async (options: { xliffFiles: string[]; originalCsv: string; output: string }) => {
      const { config } = await setup(program);
      const {
        header,
        records,
        warnings: tableWarnings,
      } = await readTable(options.originalCsv, config.table);
      const documents = [];
      for (const file of options.xliffFiles) {
        documents.push(await readExchangeFile(file));
      }
      const imported = importReviewedDocuments(records, documents);
      await writeTable(
        importedRecordsToRows(imported.records, imported.languages, config.table, header),
        options.output,
      );
      for (const lang of imported.languages) {
        print(`${lang}: ${imported.stats.imported[lang]}/${records.length} record(s) imported`);
      }
      printWarnings([...tableWarnings, ...imported.warnings]);
      print(`Wrote ${options.output}`);
    });

  program
    .command("validate")
    .description("Validate a CSV export and/or an XLIFF file")
    .option("--csv <path>", "CSV file to validate")
    .option("--xliff <path>", "XLIFF file to validate")
    .addOption(versionOption())
    .action(async (options: { csv?: string; xliff?: string; xliffVersion?: string }) => {
      const { config } = await setup(program);
      if (!options.csv && !options.xliff) {
        throw new ConfigError("Pass --csv and/or --xliff.");
      }
      let valid = true;
      if (options.csv) {
        const result = await validateTable(options.csv, config.table);
        valid = valid && result.valid;
        print(`${options.csv}: ${result.valid ? "valid" : "invalid"} (${result.rowCount} row(s))`);
        for (const error of result.errors) print(`  error: ${error}`);
        for (const warning of result.warnings) print(`  warning: ${warning.message}`);
      }
      if (options.xliff) {
        const expected =
          options.xliffVersion && isXliffVersion(options.xliffVersion) ? options.xliffVersion : undefined;
        const result = validateExchangeXml(await fs.readFile(options.xliff, "utf8"), expected);
        valid = valid && result.valid;
        print(
          `${options.xliff}: ${result.valid ? "valid" : "invalid"} XLIFF ${result.version ?? "?"} (${result.unitCount} unit(s))`,
        );
        for (const error of result.errors) print(`  error: ${error}`);
        for (const warning of result.warnings) print(`  warning: ${warning}`);
      }
      if (!valid) process.exitCode = 1;
    });

  program
    .command("report-generate")
    .description("Render an LQA results file as JSON, CSV and/or HTML")
    .requiredOption("--lqa-json <path>", "lqa_results_<lang>.json file")
    .requiredOption("-o, --output-dir <dir>", "directory for the reports")
    .addOption(
      new Option("-f, --format <format>", "report format").choices(["json", "csv", "html", "all"]).default("all"),
    )
    .action(async (options: { lqaJson: string; outputDir: string; format: string }) => {
      await setup(program);
      const file = await readLqaResultFile(options.lqaJson);
      const written = await writeLqaReports(file, options.outputDir, parseReportFormats(options.format));
      for (const target of written) print(`Wrote ${target}`);
    });

  program
    .command("serve")
    .description("Start the HTTP API")
    .action(async () => {
      const options = program.opts<GlobalOptions>();
      const env = loadEnv({
        ...process.env,
        ...(options.configDir ? { TRANSLATION_CONFIG_DIR: options.configDir } : {}),
        ...(options.logLevel ? { LOG_LEVEL: options.logLevel } : {}),
      });
      configureLogger({ level: env.LOG_LEVEL, file: options.logFile });
      await startServer(env);
    });

  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync([...argv]);
  } catch (error) {
    const code = isPipelineError(error) ? error.code : "internal_error";
    process.stderr.write(`error[${code}]: ${describeError(error)}\n`);
    if (!isPipelineError(error)) {
      createLogger("cli").error({ err: error }, "Command failed");
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
