import { describe, test } from "node:test";
import assert from "node:assert/strict";

import {
  classifyRetryableError,
  computeBackoffDelay,
  runWithProviderRetry,
  type ProviderRetryAttemptContext,
} from "../providerRetry";

const rateLimited = () => Object.assign(new Error("Rate limit reached"), { status: 429 });

describe("classifyRetryableError", () => {
  test("recognizes provider failures worth retrying", () => {
    assert.equal(classifyRetryableError(rateLimited()), "rate_limit");
    assert.equal(classifyRetryableError({ error: { type: "rate_limit_error" } }), "rate_limit");
    assert.equal(classifyRetryableError({ status: 502 }), "server_error");
    assert.equal(classifyRetryableError({ status: 408 }), "timeout");
    assert.equal(classifyRetryableError({ name: "APIConnectionError" }), "connection");
    assert.equal(classifyRetryableError({ code: "ECONNRESET" }), "connection");
  });

  test("does not retry client errors or non-objects", () => {
    assert.equal(classifyRetryableError({ status: 401 }), null);
    assert.equal(classifyRetryableError(new Error("boom")), null);
    assert.equal(classifyRetryableError("boom"), null);
  });
});

describe("computeBackoffDelay", () => {
  test("doubles and caps the delay", () => {
    assert.deepEqual(
      [0, 1, 2, 5].map((index) => computeBackoffDelay(index, 500, 4000)),
      [500, 1000, 2000, 4000],
    );
  });
});

describe("runWithProviderRetry", () => {
  test("retries until the call succeeds", async () => {
    const delays: number[] = [];
    const seen: ProviderRetryAttemptContext[] = [];
    let calls = 0;

    const result = await runWithProviderRetry({
      call: async () => {
        calls += 1;
        if (calls < 3) throw rateLimited();
        return "done";
      },
      maxAttempts: 3,
      baseDelayMs: 100,
      sleep: async (ms) => {
        delays.push(ms);
      },
      onAttempt: (context) => seen.push(context),
    });

    assert.equal(result.response, "done");
    assert.equal(result.attempts, 3);
    assert.deepEqual(delays, [100, 200]);
    assert.deepEqual(
      seen.map((context) => [context.attemptIndex, context.reason, context.delayMs]),
      [
        [0, "initial", 0],
        [1, "rate_limit", 100],
        [2, "rate_limit", 200],
      ],
    );
  });

  test("rethrows the last error once attempts run out", async () => {
    let calls = 0;
    await assert.rejects(
      runWithProviderRetry({
        call: async () => {
          calls += 1;
          throw Object.assign(new Error(`attempt ${calls}`), { status: 500 });
        },
        maxAttempts: 2,
        sleep: async () => undefined,
      }),
      { message: "attempt 2" },
    );
    assert.equal(calls, 2);
  });

  test("stops at the first non-retryable error", async () => {
    let calls = 0;
    await assert.rejects(
      runWithProviderRetry({
        call: async () => {
          calls += 1;
          throw new Error("invalid prompt");
        },
        maxAttempts: 5,
        sleep: async () => undefined,
      }),
      { message: "invalid prompt" },
    );
    assert.equal(calls, 1);
  });
});
