import type OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";

import type { TokenUsage } from "../models/TranslationResult";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  jsonObject?: boolean;
}

export interface ChatCompletionReply {
  text: string;
  model: string;
  usage: TokenUsage;
  finishReason: string | null;
  requestId: string | null;
}

/** The one provider call the agents make; swapped for a fake in tests. */
export type ChatCompletionCaller = (
  request: ChatCompletionRequest,
) => Promise<ChatCompletionReply>;

const JSON_CONTROL_CHAR_REGEX =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export function extractChatCompletion(
  completion: ChatCompletion,
  requestedModel: string,
): ChatCompletionReply {
  const choice = completion.choices[0];
  return {
    text: choice?.message?.content?.trim() ?? "",
    model: completion.model || requestedModel,
    usage: {
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
    },
    finishReason: choice?.finish_reason ?? null,
    requestId: completion.id ?? null,
  };
}

export function createOpenAIChatCaller(client: OpenAI): ChatCompletionCaller {
  return async (request) => {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: request.messages,
    };
    if (typeof request.temperature === "number") {
      params.temperature = request.temperature;
    }
    if (typeof request.maxTokens === "number") {
      params.max_tokens = request.maxTokens;
    }
    if (request.jsonObject) {
      params.response_format = { type: "json_object" };
    }
    const completion = await client.chat.completions.create(params);
    return extractChatCompletion(completion, request.model);
  };
}

const balanceStructuralPairs = (
  value: string,
  open: string,
  close: string,
): { value: string; applied: boolean } => {
  const openReg = new RegExp(`\\${open}`, "g");
  const closeReg = new RegExp(`\\${close}`, "g");
  const openCount = (value.match(openReg) ?? []).length;
  const closeCount = (value.match(closeReg) ?? []).length;
  if (openCount > closeCount) {
    return {
      value: value + close.repeat(openCount - closeCount),
      applied: true,
    };
  }
  return { value, applied: false };
};

export const repairJsonString = (raw: string): { value: string; applied: boolean } => {
  let value = raw.trim();
  let applied = false;

  const fenced = value.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (fenced) {
    value = fenced[1];
    applied = true;
  }

  const sanitized = value.replace(JSON_CONTROL_CHAR_REGEX, "");
  if (sanitized !== value) {
    value = sanitized;
    applied = true;
  }

  const lastStructuralIndex = Math.max(
    value.lastIndexOf("}"),
    value.lastIndexOf("]"),
  );
  if (lastStructuralIndex !== -1 && lastStructuralIndex < value.length - 1) {
    value = value.slice(0, lastStructuralIndex + 1).trimEnd();
    applied = true;
  }

  const quoteCount = (value.match(/"/g) ?? []).length;
  if (quoteCount % 2 !== 0) {
    value += '"';
    applied = true;
  }

  const braceResult = balanceStructuralPairs(value, "{", "}");
  value = braceResult.value;
  applied = applied || braceResult.applied;

  const bracketResult = balanceStructuralPairs(value, "[", "]");
  value = bracketResult.value;
  applied = applied || bracketResult.applied;

  return { value, applied };
};

/**
 * Parses model output as JSON, retrying once on a repaired copy. Throws the
 * original SyntaxError when neither parses.
 */
export function parseModelJson(text: string): { value: unknown; repairApplied: boolean } {
  try {
    return { value: JSON.parse(text), repairApplied: false };
  } catch (error) {
    const repaired = repairJsonString(text);
    if (!repaired.applied) throw error;
    try {
      return { value: JSON.parse(repaired.value), repairApplied: true };
    } catch {
      throw error;
    }
  }
}
