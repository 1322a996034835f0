import { describe, test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { ConfigError } from "../../services/errors";
import { buildTestConfig } from "../../services/__tests__/pipelineFixtures";
import {
  buildPipelineConfig,
  buildPromptTemplates,
  buildQualityCriteria,
  DEFAULT_TABLE_COLUMNS,
  loadPipelineConfig,
  requireLanguage,
  requireLanguages,
  selectPromptTemplate,
  withApproveThreshold,
} from "../pipelineConfig";

const REPO_CONFIG_DIR = path.resolve(__dirname, "../../../config");

describe("loadPipelineConfig", () => {
  test("loads the shipped configuration", async () => {
    const config = await loadPipelineConfig(REPO_CONFIG_DIR);

    assert.equal(Object.keys(config.languages).length, 8);
    assert.equal(config.languages["zh-CN"].name, "Chinese (Simplified)");
    assert.deepEqual(
      config.quality.dimensions.map((dim) => dim.name),
      ["accuracy", "fluency", "terminology", "style", "grammar", "completeness", "formatting"],
    );
    assert.deepEqual(config.quality.thresholds, { approve: 85, reject: 60, criticalFloor: 20 });
    assert.equal(config.prompts.categoryMap.button, "ui_strings");
    assert.deepEqual(config.table, DEFAULT_TABLE_COLUMNS);
  });

  test("returns a frozen configuration", async () => {
    const config = await loadPipelineConfig(REPO_CONFIG_DIR);
    assert.equal(Object.isFrozen(config), true);
    assert.equal(Object.isFrozen(config.quality.thresholds), true);
    assert.equal(Object.isFrozen(config.quality.dimensions[0]), true);
  });

  test("treats table.yaml as optional and requires the other files", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-config-"));
    try {
      for (const name of ["languages.yaml", "lqa_criteria.yaml", "translation_prompts.yaml"]) {
        await fs.copyFile(path.join(REPO_CONFIG_DIR, name), path.join(dir, name));
      }
      const config = await loadPipelineConfig(dir);
      assert.deepEqual(config.table, DEFAULT_TABLE_COLUMNS);

      await fs.rm(path.join(dir, "languages.yaml"));
      await assert.rejects(loadPipelineConfig(dir), (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.match(error.message, /^Cannot read .*languages\.yaml/);
        return true;
      });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("buildQualityCriteria", () => {
  test("rejects weights that do not sum to one", () => {
    assert.throws(
      () =>
        buildQualityCriteria({
          dimensions: { accuracy: { weight: 0.6 }, fluency: { weight: 0.3 } },
        }),
      { name: "ConfigError", message: "Quality dimension weights must sum to 1.0, got 0.9" },
    );
  });

  test("accepts weights within the tolerance and fills defaults", () => {
    const criteria = buildQualityCriteria({
      dimensions: {
        accuracy: { weight: 0.505, critical: true },
        fluency: { weight: 0.5 },
      },
    });
    assert.deepEqual(criteria.thresholds, { approve: 85, reject: 60, criticalFloor: 20 });
    assert.deepEqual(criteria.dimensions[0], {
      name: "accuracy",
      weight: 0.505,
      description: "",
      critical: true,
      minimum: 70,
    });
  });

  test("rejects a reject threshold above the approve threshold", () => {
    assert.throws(
      () =>
        buildQualityCriteria({
          dimensions: { accuracy: { weight: 1 } },
          thresholds: { approve: 50, reject: 70 },
        }),
      { message: "Reject threshold (70) must not exceed approve threshold (50)" },
    );
  });

  test("rejects a critical minimum below the critical floor", () => {
    assert.throws(
      () =>
        buildQualityCriteria({
          dimensions: { accuracy: { weight: 1, critical: true, minimum: 10 } },
        }),
      { message: 'Dimension "accuracy" minimum (10) is below the critical floor (20)' },
    );
  });

  test("reports schema problems with their path", () => {
    assert.throws(
      () => buildQualityCriteria({ dimensions: { accuracy: { weight: 2 } } }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.match(error.message, /^lqa_criteria is invalid: dimensions\.accuracy\.weight:/);
        return true;
      },
    );
  });
});

describe("buildPromptTemplates", () => {
  test("requires a {text} placeholder in every template", () => {
    assert.throws(
      () => buildPromptTemplates({ default_prompt: "Translate to {target_lang}" }),
      { message: 'Prompt template "default_prompt" has no {text} placeholder' },
    );
  });

  test("rejects explicit categories that point at a missing template", () => {
    assert.throws(
      () =>
        buildPromptTemplates({
          default_prompt: "{text}",
          categories: { missing: ["x"] },
        }),
      { message: 'Category "x" references unknown prompt template "missing"' },
    );
  });

  test("skips default category groups whose template is absent", () => {
    const prompts = buildPromptTemplates({ default_prompt: "{text}" });
    assert.deepEqual(prompts.categoryMap, {});
    assert.equal(prompts.system, "You are an expert translator.");
  });
});

describe("language and template lookup", () => {
  const config = buildTestConfig();

  test("selects the template mapped to a category, case-insensitively", () => {
    assert.equal(selectPromptTemplate(config.prompts, " Button "), "UI {category} for {target_lang}: {text}");
    assert.equal(selectPromptTemplate(config.prompts, "tooltip"), config.prompts.defaultPrompt);
    assert.equal(selectPromptTemplate(config.prompts, null), config.prompts.defaultPrompt);
  });

  test("fails on unknown language codes", () => {
    assert.equal(requireLanguage(config, "ja-JP").name, "Japanese");
    assert.throws(() => requireLanguage(config, "xx"), { message: "Unknown language code: xx" });
    assert.throws(() => requireLanguages(config, ["en", "xx", "yy"]), {
      message: "Unknown language code(s): xx, yy",
    });
    assert.throws(() => requireLanguage(config, "toString"), ConfigError);
  });

  test("rejects a language declared twice", () => {
    assert.throws(
      () =>
        buildPipelineConfig({
          languages: {
            languages: [
              { code: "en", name: "English", bcp47: "en-US", native_name: "English" },
              { code: "en", name: "English", bcp47: "en-GB", native_name: "English" },
            ],
          },
          quality: { dimensions: { accuracy: { weight: 1 } } },
          prompts: { default_prompt: "{text}" },
        }),
      { message: 'Language "en" is declared twice' },
    );
  });
});

describe("withApproveThreshold", () => {
  const { quality } = buildTestConfig();

  test("returns a re-validated copy", () => {
    const next = withApproveThreshold(quality, 90);
    assert.equal(next.thresholds.approve, 90);
    assert.equal(next.thresholds.reject, 60);
    assert.equal(quality.thresholds.approve, 85);
    assert.equal(Object.isFrozen(next.thresholds), true);
  });

  test("rejects thresholds that conflict with the reject threshold", () => {
    assert.throws(() => withApproveThreshold(quality, 50), {
      message: "Reject threshold (60) must not exceed approve threshold (50)",
    });
    assert.throws(() => withApproveThreshold(quality, 101), {
      message: "Approve threshold must be between 0 and 100, got 101",
    });
  });
});
