// server/agents/translation/translationAgent.ts
// Translates one short UI/compliance string per call through the chat completions API.

import type { PipelineConfig } from "../../config/pipelineConfig";
import { getLanguage } from "../../config/pipelineConfig";
import {
  ConfigError,
  describeError,
  TranslationFailure,
} from "../../services/errors";
import type { ChatCompletionCaller, ChatCompletionReply } from "../../services/llm";
import { createLogger, type Logger } from "../../services/logger";
import {
  classifyRetryableError,
  runWithProviderRetry,
} from "../../services/providerRetry";
import {
  enforceMaxLength,
  stripWrappingQuotes,
} from "../../services/translation/guards";
import type { TranslationResult } from "../../models/TranslationResult";
import { buildPromptForCategory } from "./promptBuilder";
import {
  translateSequentially,
  type TranslationClient,
  type TranslationOutcome,
  type TranslationRequest,
} from "./types";

const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_MAX_TOKENS = 1000;

export interface TranslationAgentOptions {
  caller: ChatCompletionCaller;
  config: PipelineConfig;
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** Provider attempts per string, including the first one. */
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  logger?: Logger;
}

export class OpenAiTranslationAgent implements TranslationClient {
  private readonly options: TranslationAgentOptions;
  private readonly logger: Logger;

  constructor(options: TranslationAgentOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger("translation-agent");
  }

  get model(): string {
    return this.options.model;
  }

  async translate(request: TranslationRequest): Promise<TranslationOutcome> {
    const { config, caller, model } = this.options;
    const language = getLanguage(config, request.targetLang);
    if (!language) {
      const cause = new ConfigError(`Unknown target language: ${request.targetLang}`);
      return {
        ok: false,
        error: new TranslationFailure(cause.message, { cause }),
      };
    }

    const prompt = buildPromptForCategory(config.prompts, {
      text: request.text,
      sourceLang: request.sourceLang,
      targetLang: request.targetLang,
      targetLangName: language.name,
      category: request.category,
      context: request.context,
      maxLength: request.maxLength,
    });

    this.logger.debug(
      { targetLang: request.targetLang, length: request.text.length },
      "Translating text",
    );

    let reply: ChatCompletionReply;
    try {
      const { response } = await runWithProviderRetry({
        call: () =>
          caller({
            model,
            temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
            maxTokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
            messages: [
              { role: "system", content: prompt.system },
              { role: "user", content: prompt.user },
            ],
          }),
        maxAttempts: this.options.maxAttempts,
        sleep: this.options.sleep,
        onAttempt: (context) => {
          if (context.attemptIndex > 0) {
            this.logger.warn(
              { attempt: context.attemptIndex + 1, reason: context.reason, delayMs: context.delayMs },
              "Retrying translation call",
            );
          }
        },
      });
      reply = response;
    } catch (error) {
      this.logger.error(
        { targetLang: request.targetLang, err: error },
        "Translation failed",
      );
      return {
        ok: false,
        error: new TranslationFailure(describeError(error), {
          cause: error,
          retryable: classifyRetryableError(error) !== null,
        }),
      };
    }

    const cleaned = stripWrappingQuotes(reply.text);
    if (!cleaned) {
      return {
        ok: false,
        error: new TranslationFailure("Provider returned an empty translation"),
      };
    }

    const guarded = enforceMaxLength(cleaned, request.maxLength, {
      targetLang: request.targetLang,
    });
    if (guarded.warning) {
      this.logger.warn({ warning: guarded.warning }, guarded.warning.message);
    }

    const result: TranslationResult = {
      sourceText: request.text,
      translatedText: guarded.text,
      sourceLang: request.sourceLang,
      targetLang: request.targetLang,
      model: reply.model,
      usage: reply.usage,
      timestamp: (this.options.now?.() ?? new Date()).toISOString(),
      category: request.category ?? null,
    };

    this.logger.debug(
      { tokens: result.usage.promptTokens + result.usage.completionTokens },
      "Translation successful",
    );
    return {
      ok: true,
      result,
      warnings: guarded.warning ? [guarded.warning] : [],
    };
  }

  translateBatch(requests: readonly TranslationRequest[]): Promise<TranslationOutcome[]> {
    return translateSequentially(this, requests);
  }
}
