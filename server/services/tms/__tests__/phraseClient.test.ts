import { describe, test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { LqaResultFile } from "../../../models/QualityEvaluation";
import { ConfigError, TmsError } from "../../errors";
import {
  annotationsFromLqaResults,
  formatLqaComment,
  PhraseTmsClient,
  type FetchLike,
} from "../phraseClient";

interface RecordedCall {
  url: string;
  method: string;
  authorization: string | null;
  body: RequestInit["body"];
}

const credentials = { token: "test-token", projectId: "proj-1", baseUrl: "https://phrase.test/v2/" };

const json = (value: unknown, status = 200) =>
  new Response(JSON.stringify(value), { status, headers: { "Content-Type": "application/json" } });

const createFetch = (respond: (url: string, method: string) => Response) => {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const method = init?.method ?? "GET";
    calls.push({
      url,
      method,
      authorization: new Headers(init?.headers).get("Authorization"),
      body: init?.body,
    });
    return respond(url, method);
  };
  return { calls, fetchImpl };
};

describe("PhraseTmsClient", () => {
  test("uploads a file and comments on the keys it can find", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "phrase-"));
    try {
      const filePath = path.join(dir, "translations_zh-CN.xliff");
      await fs.writeFile(filePath, "<xliff/>", "utf8");

      const { calls, fetchImpl } = createFetch((url, method) => {
        if (url.endsWith("/uploads")) return json({ id: "up-1", state: "success" });
        if (url.includes("/keys?q=name%3ASave+Button")) return json([{ id: "key-1", name: "Save Button" }]);
        if (url.includes("/keys?")) return json([]);
        if (method === "POST" && url.endsWith("/comments")) return json({ id: "c-1" }, 201);
        return new Response("not found", { status: 404 });
      });
      const client = new PhraseTmsClient({ credentials, fetch: fetchImpl });

      const summary = await client.uploadExchangeFile(filePath, "zh-CN", [
        { keyName: "Save Button", weightedScore: 83.5, status: "needs_review" },
        { keyName: "Missing Key", weightedScore: 90, status: "approved" },
      ]);

      assert.deepEqual(summary, { uploadId: "up-1", commentsAdded: 1, missingKeys: ["Missing Key"] });
      assert.deepEqual(
        calls.map((call) => `${call.method} ${call.url}`),
        [
          "POST https://phrase.test/v2/projects/proj-1/uploads",
          "GET https://phrase.test/v2/projects/proj-1/keys?q=name%3ASave+Button",
          "POST https://phrase.test/v2/projects/proj-1/keys/key-1/comments",
          "GET https://phrase.test/v2/projects/proj-1/keys?q=name%3AMissing+Key",
        ],
      );
      assert.ok(calls.every((call) => call.authorization === "token test-token"));

      const form = calls[0].body;
      assert.ok(form instanceof FormData);
      assert.equal(form.get("file_format"), "xliff");
      assert.equal(form.get("locale_id"), "zh-CN");
      assert.equal(form.get("update_translations"), "true");
      assert.equal(calls[2].body, JSON.stringify({ message: "LQA 83.5 (needs_review)" }));
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  test("downloads the reviewed file for a job", async () => {
    const { calls, fetchImpl } = createFetch(() => new Response("<xliff version=\"1.2\"/>"));
    const client = new PhraseTmsClient({ credentials, fetch: fetchImpl });

    assert.equal(await client.downloadJobLocale("42", "zh-CN"), '<xliff version="1.2"/>');
    assert.equal(
      calls[0].url,
      "https://phrase.test/v2/projects/proj-1/locales/zh-CN/download?file_format=xliff&tags=job-42",
    );
  });

  test("raises TmsError with the response status", async () => {
    const { fetchImpl } = createFetch(() => new Response("forbidden", { status: 403 }));
    const client = new PhraseTmsClient({ credentials, fetch: fetchImpl });

    await assert.rejects(client.downloadJobLocale("42", "zh-CN"), (error: unknown) => {
      assert.ok(error instanceof TmsError);
      assert.equal(error.status, 403);
      assert.equal(
        error.message,
        "Phrase request failed (403) GET https://phrase.test/v2/projects/proj-1/locales/zh-CN/download?file_format=xliff&tags=job-42: forbidden",
      );
      return true;
    });
  });

  test("rejects responses of an unexpected shape", async () => {
    const { fetchImpl } = createFetch(() => json({ unexpected: true }));
    const client = new PhraseTmsClient({ credentials, fetch: fetchImpl });

    await assert.rejects(client.findKeyId("Save Button"), (error: unknown) => {
      assert.ok(error instanceof TmsError);
      assert.match(error.message, /^Unexpected Phrase response from /);
      return true;
    });
  });

  test("requires credentials", () => {
    assert.throws(
      () => new PhraseTmsClient({ credentials: { ...credentials, token: "" } }),
      (error: unknown) => error instanceof ConfigError && error.message === "Phrase API token is required",
    );
  });
});

describe("LQA annotations", () => {
  test("formats comments and skips unevaluated entries", () => {
    const file: LqaResultFile = {
      sourceLang: "en",
      targetLang: "zh-CN",
      generatedAt: "2024-05-01T12:00:00.000Z",
      criteria: { thresholds: { approve: 85, reject: 60, criticalFloor: 20 }, weights: { accuracy: 1 } },
      entries: [
        {
          recordId: 1,
          displayKey: "Save Button",
          sourceText: "Save",
          translatedText: "保存",
          evaluation: {
            dimensionScores: { accuracy: 90 },
            weightedScore: 90,
            status: "approved",
            failedCriticalDimensions: [],
          },
        },
        { recordId: 2, displayKey: "Cancel", sourceText: "Cancel", translatedText: "", evaluation: null },
      ],
    };

    assert.deepEqual(annotationsFromLqaResults(file), [
      { keyName: "Save Button", weightedScore: 90, status: "approved" },
    ]);
    assert.equal(formatLqaComment({ weightedScore: 90, status: "approved" }), "LQA 90.0 (approved)");
  });
});
