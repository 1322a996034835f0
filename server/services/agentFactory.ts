import OpenAI from "openai";

import { OpenAiQualityAgent } from "../agents/qualityAgent";
import type { QualityEvaluator } from "../agents/quality/types";
import { OpenAiTranslationAgent } from "../agents/translation/translationAgent";
import type { TranslationClient } from "../agents/translation/types";
import { requireOpenAiKey, type AppEnv } from "../config/env";
import type { PipelineConfig } from "../config/pipelineConfig";
import { createOpenAIChatCaller, type ChatCompletionCaller } from "./llm";

export interface AgentFactory {
  createTranslationClient(): TranslationClient;
  createEvaluator(): QualityEvaluator;
}

/**
 * Agents backed by the OpenAI API. The client is only created (and the API
 * key only required) when an agent is first asked for.
 */
export function createOpenAiAgentFactory(env: AppEnv, config: PipelineConfig): AgentFactory {
  let caller: ChatCompletionCaller | null = null;
  const getCaller = (): ChatCompletionCaller => {
    if (!caller) {
      // retries happen in runWithProviderRetry, not in the SDK
      caller = createOpenAIChatCaller(
        new OpenAI({ apiKey: requireOpenAiKey(env), timeout: 60_000, maxRetries: 0 }),
      );
    }
    return caller;
  };

  return {
    createTranslationClient: () =>
      new OpenAiTranslationAgent({
        caller: getCaller(),
        config,
        model: env.TRANSLATION_MODEL,
        maxAttempts: env.PROVIDER_MAX_RETRIES,
      }),
    createEvaluator: () =>
      new OpenAiQualityAgent({
        caller: getCaller(),
        config,
        model: env.QUALITY_MODEL,
        maxAttempts: env.PROVIDER_MAX_RETRIES,
      }),
  };
}
