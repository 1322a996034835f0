import { describe, test } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";

import { loadPipelineConfig } from "../../../config/pipelineConfig";
import { QualityEvaluationError } from "../../errors";
import { buildTestConfig } from "../../__tests__/pipelineFixtures";
import { deriveStatus, formatScore, scoreDimensions } from "../scoring";

const { quality } = buildTestConfig();

describe("scoreDimensions", () => {
  test("weights the shipped dimensions", async () => {
    const config = await loadPipelineConfig(path.resolve(__dirname, "../../../../config"));
    const evaluation = scoreDimensions(
      {
        accuracy: 90,
        fluency: 80,
        terminology: 70,
        style: 60,
        grammar: 90,
        completeness: 100,
        formatting: 100,
      },
      config.quality,
    );
    assert.equal(evaluation.weightedScore, 83.5);
    assert.equal(evaluation.status, "needs_review");
    assert.deepEqual(evaluation.failedCriticalDimensions, []);
  });

  test("approves at the approve threshold", () => {
    const evaluation = scoreDimensions({ accuracy: 70, fluency: 100, formatting: 100 }, quality);
    assert.equal(evaluation.weightedScore, 85);
    assert.equal(evaluation.status, "approved");
  });

  test("compares the unrounded score with the approve threshold", () => {
    const evaluation = scoreDimensions({ accuracy: 84.996, fluency: 84.996, formatting: 84.996 }, quality);
    assert.equal(evaluation.weightedScore, 85);
    assert.equal(evaluation.status, "needs_review");
  });

  test("flags critical dimensions under their minimum", () => {
    const evaluation = scoreDimensions({ accuracy: 65, fluency: 100, formatting: 100 }, quality);
    assert.equal(evaluation.weightedScore, 82.5);
    assert.equal(evaluation.status, "needs_review");
    assert.deepEqual(evaluation.failedCriticalDimensions, ["accuracy"]);
  });

  test("rejects scores under the reject threshold", () => {
    const evaluation = scoreDimensions({ accuracy: 70, fluency: 40, formatting: 40 }, quality);
    assert.equal(evaluation.weightedScore, 55);
    assert.equal(evaluation.status, "rejected");
  });

  test("clamps dimension scores and drops unconfigured ones", () => {
    const evaluation = scoreDimensions({ accuracy: 120, fluency: -5, formatting: 100, tone: 50 }, quality);
    assert.deepEqual(evaluation.dimensionScores, { accuracy: 100, fluency: 0, formatting: 100 });
    assert.equal(evaluation.weightedScore, 70);
    assert.equal(Object.isFrozen(evaluation), true);
  });

  test("fails when a configured dimension has no usable score", () => {
    assert.throws(
      () => scoreDimensions({ accuracy: 90, fluency: Number.NaN }, quality),
      (error: unknown) => {
        assert.ok(error instanceof QualityEvaluationError);
        assert.equal(error.message, "Missing dimension scores: fluency, formatting");
        return true;
      },
    );
  });
});

describe("deriveStatus", () => {
  test("a critical failure keeps a high score out of approval", () => {
    assert.deepEqual(deriveStatus(90, { accuracy: 60 }, quality), {
      status: "needs_review",
      failedCriticalDimensions: ["accuracy"],
    });
  });

  test("a critical dimension under the floor rejects outright", () => {
    assert.equal(deriveStatus(75, { accuracy: 15 }, quality).status, "rejected");
  });
});

describe("formatScore", () => {
  test("shows one decimal", () => {
    assert.equal(formatScore(83.5), "83.5");
    assert.equal(formatScore(90), "90.0");
  });
});
