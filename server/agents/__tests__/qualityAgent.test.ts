import { describe, test } from "node:test";
import assert from "node:assert/strict";

import { QualityEvaluationError } from "../../services/errors";
import type { ChatCompletionRequest } from "../../services/llm";
import { buildTestConfig } from "../../services/__tests__/pipelineFixtures";
import { buildQualityPrompt, OpenAiQualityAgent } from "../qualityAgent";

const config = buildTestConfig();

const createAgent = (respond: () => Promise<string>) => {
  const requests: ChatCompletionRequest[] = [];
  const agent = new OpenAiQualityAgent({
    caller: async (request) => {
      requests.push(request);
      return {
        text: await respond(),
        model: "gpt-test-mini",
        usage: { promptTokens: 40, completionTokens: 20 },
        finishReason: "stop",
        requestId: null,
      };
    },
    config,
    model: "gpt-test-mini",
    maxAttempts: 1,
  });
  return { agent, requests };
};

const expectEvaluationError = (message: string) => (error: unknown) => {
  assert.ok(error instanceof QualityEvaluationError);
  assert.equal(error.message, message);
  return true;
};

describe("buildQualityPrompt", () => {
  test("lists every configured dimension and the expected JSON shape", () => {
    const prompt = buildQualityPrompt(config, {
      sourceText: "Save",
      translatedText: "保存",
      targetLang: "zh-CN",
      context: "button",
    });

    assert.equal(
      prompt.system,
      [
        "You are a professional linguist performing language quality assessment (LQA).",
        "Score the translation on each dimension from 0 (unusable) to 100 (flawless).",
        "Dimensions:",
        "- accuracy: Meaning is preserved.",
        "- fluency: Reads naturally.",
        "- formatting: Placeholders are kept.",
        'Respond with JSON only: {"scores": {"accuracy": <0-100>, "fluency": <0-100>, "formatting": <0-100>}, "comments": "<one sentence>"}',
      ].join("\n"),
    );
    assert.equal(
      prompt.user,
      "Target language: Chinese (Simplified) (zh-CN)\nContext: button\n\nSource:\nSave\n\nTranslation:\n保存",
    );
  });
});

describe("OpenAiQualityAgent", () => {
  test("returns scores for the configured dimensions", async () => {
    const { agent, requests } = createAgent(async () =>
      JSON.stringify({
        scores: { accuracy: 95, fluency: "90", formatting: 80, tone: 10 },
        comments: "Accurate and natural.",
      }),
    );

    const scores = await agent.evaluate("Save", "保存", "zh-CN");

    assert.deepEqual(scores, { accuracy: 95, fluency: 90, formatting: 80 });
    assert.equal(requests[0].jsonObject, true);
    assert.equal(requests[0].maxTokens, 500);
    assert.equal(requests[0].temperature, 0);
    assert.equal(requests[0].model, "gpt-test-mini");
  });

  test("accepts fenced JSON", async () => {
    const { agent } = createAgent(
      async () => '```json\n{"scores": {"accuracy": 70, "fluency": 60, "formatting": 50}}\n```',
    );
    assert.deepEqual(await agent.evaluate("Save", "保存", "zh-CN"), {
      accuracy: 70,
      fluency: 60,
      formatting: 50,
    });
  });

  test("rejects replies that are not JSON", async () => {
    const { agent } = createAgent(async () => "no idea");
    await assert.rejects(
      agent.evaluate("Save", "保存", "zh-CN"),
      expectEvaluationError("LQA response is not valid JSON"),
    );
  });

  test("rejects replies without scores", async () => {
    const { agent } = createAgent(async () => JSON.stringify({ comments: "fine" }));
    await assert.rejects(
      agent.evaluate("Save", "保存", "zh-CN"),
      expectEvaluationError("LQA response has an unexpected shape: scores: Required"),
    );
  });

  test("rejects replies missing a dimension", async () => {
    const { agent } = createAgent(async () => JSON.stringify({ scores: { accuracy: 95 } }));
    await assert.rejects(
      agent.evaluate("Save", "保存", "zh-CN"),
      expectEvaluationError("LQA response is missing dimensions: fluency, formatting"),
    );
  });

  test("wraps provider failures", async () => {
    const { agent } = createAgent(async () => {
      throw Object.assign(new Error("invalid api key"), { status: 401 });
    });
    await assert.rejects(
      agent.evaluate("Save", "保存", "zh-CN"),
      expectEvaluationError("Quality evaluation call failed: invalid api key"),
    );
  });
});
