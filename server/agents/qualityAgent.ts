// server/agents/qualityAgent.ts
// Scores one translated string along the configured LQA dimensions.

import { z } from "zod";

import type { PipelineConfig } from "../config/pipelineConfig";
import { getLanguage } from "../config/pipelineConfig";
import type { DimensionScores } from "../models/QualityEvaluation";
import { describeError, QualityEvaluationError } from "../services/errors";
import { parseModelJson, type ChatCompletionCaller } from "../services/llm";
import { createLogger, type Logger } from "../services/logger";
import { runWithProviderRetry } from "../services/providerRetry";
import type { QualityEvaluator } from "./quality/types";

const DEFAULT_TEMPERATURE = 0;
const DEFAULT_MAX_TOKENS = 500;

const EvalJson = z.object({
  scores: z.record(z.coerce.number()),
  comments: z.string().optional(),
});

export interface QualityAgentOptions {
  caller: ChatCompletionCaller;
  config: PipelineConfig;
  model: string;
  temperature?: number;
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export function buildQualityPrompt(
  config: PipelineConfig,
  input: {
    sourceText: string;
    translatedText: string;
    targetLang: string;
    context?: string | null;
  },
): { system: string; user: string } {
  const dimensions = config.quality.dimensions
    .map((dim) => `- ${dim.name}: ${dim.description || dim.name}`)
    .join("\n");
  const keys = config.quality.dimensions.map((dim) => `"${dim.name}": <0-100>`).join(", ");
  const language = getLanguage(config, input.targetLang);

  const system = [
    "You are a professional linguist performing language quality assessment (LQA).",
    "Score the translation on each dimension from 0 (unusable) to 100 (flawless).",
    "Dimensions:",
    dimensions,
    `Respond with JSON only: {"scores": {${keys}}, "comments": "<one sentence>"}`,
  ].join("\n");

  const user = [
    `Target language: ${language ? `${language.name} (${input.targetLang})` : input.targetLang}`,
    `Context: ${input.context?.trim() || "None"}`,
    "",
    "Source:",
    input.sourceText,
    "",
    "Translation:",
    input.translatedText,
  ].join("\n");

  return { system, user };
}

export class OpenAiQualityAgent implements QualityEvaluator {
  private readonly options: QualityAgentOptions;
  private readonly logger: Logger;

  constructor(options: QualityAgentOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger("quality-agent");
  }

  async evaluate(
    sourceText: string,
    translatedText: string,
    targetLang: string,
    context?: string | null,
  ): Promise<DimensionScores> {
    const { caller, config, model } = this.options;
    const prompt = buildQualityPrompt(config, {
      sourceText,
      translatedText,
      targetLang,
      context,
    });

    let text: string;
    try {
      const { response } = await runWithProviderRetry({
        call: () =>
          caller({
            model,
            temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
            maxTokens: DEFAULT_MAX_TOKENS,
            jsonObject: true,
            messages: [
              { role: "system", content: prompt.system },
              { role: "user", content: prompt.user },
            ],
          }),
        maxAttempts: this.options.maxAttempts,
        sleep: this.options.sleep,
      });
      text = response.text;
    } catch (error) {
      throw new QualityEvaluationError(
        `Quality evaluation call failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    let raw: unknown;
    try {
      const parsed = parseModelJson(text);
      if (parsed.repairApplied) {
        this.logger.warn({ targetLang }, "Repaired malformed LQA response");
      }
      raw = parsed.value;
    } catch (error) {
      throw new QualityEvaluationError("LQA response is not valid JSON", { cause: error });
    }

    const result = EvalJson.safeParse(raw);
    if (!result.success) {
      throw new QualityEvaluationError(
        `LQA response has an unexpected shape: ${result.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
      );
    }

    const scores: DimensionScores = {};
    const missing: string[] = [];
    for (const dim of config.quality.dimensions) {
      const value = result.data.scores[dim.name];
      if (typeof value === "number" && Number.isFinite(value)) {
        scores[dim.name] = value;
      } else {
        missing.push(dim.name);
      }
    }
    if (missing.length) {
      throw new QualityEvaluationError(`LQA response is missing dimensions: ${missing.join(", ")}`);
    }

    this.logger.debug({ targetLang, scores }, "Evaluated translation");
    return scores;
  }
}
