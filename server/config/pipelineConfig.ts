import fs from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigError, describeError } from "../services/errors";

export const WEIGHT_SUM_TOLERANCE = 0.01;

export const DEFAULT_THRESHOLDS = {
  approve: 85,
  reject: 60,
  criticalFloor: 20,
} as const;

export const DEFAULT_CRITICAL_MINIMUM = 70;

const DEFAULT_CATEGORY_TEMPLATES: Record<string, string[]> = {
  ui_strings: ["ui", "form_label", "button", "section_header"],
  compliance: ["compliance", "legal", "safety"],
};

export interface LanguageConfig {
  code: string;
  name: string;
  bcp47: string;
  nativeName: string;
}

export interface DimensionConfig {
  name: string;
  weight: number;
  description: string;
  critical: boolean;
  /** Lowest score a critical dimension may have for the translation to be approved. */
  minimum: number;
}

export interface QualityThresholds {
  approve: number;
  reject: number;
  criticalFloor: number;
}

export interface QualityCriteria {
  dimensions: readonly DimensionConfig[];
  thresholds: QualityThresholds;
}

export interface PromptTemplates {
  system: string;
  defaultPrompt: string;
  templates: Readonly<Record<string, string>>;
  /** record category -> template name */
  categoryMap: Readonly<Record<string, string>>;
}

export interface TableColumnMap {
  id: string;
  externalRef: string;
  objectRef: string;
  displayKey: string;
  sourceText: string;
  maxLength: string;
  category: string;
}

export const DEFAULT_TABLE_COLUMNS: TableColumnMap = {
  id: "_id",
  externalRef: "external_ref",
  objectRef: "object_ref",
  displayKey: "display_key",
  sourceText: "en",
  maxLength: "max_length",
  category: "category",
};

export interface PipelineConfig {
  configDir: string;
  languages: Readonly<Record<string, LanguageConfig>>;
  quality: QualityCriteria;
  prompts: PromptTemplates;
  table: TableColumnMap;
}

const score = z.number().min(0).max(100);

const languagesFileSchema = z.object({
  languages: z
    .array(
      z.object({
        code: z.string().trim().min(1),
        name: z.string().trim().min(1),
        bcp47: z.string().trim().min(1),
        native_name: z.string().trim().min(1),
      }),
    )
    .min(1),
});

export const qualityCriteriaFileSchema = z.object({
  dimensions: z
    .record(
      z.object({
        weight: z.number().min(0).max(1),
        description: z.string().default(""),
        critical: z.boolean().default(false),
        minimum: score.optional(),
      }),
    )
    .refine((value) => Object.keys(value).length > 0, {
      message: "at least one dimension is required",
    }),
  thresholds: z
    .object({
      approve: score.default(DEFAULT_THRESHOLDS.approve),
      reject: score.default(DEFAULT_THRESHOLDS.reject),
      critical_floor: score.default(DEFAULT_THRESHOLDS.criticalFloor),
    })
    .default({}),
});

export type QualityCriteriaFile = z.input<typeof qualityCriteriaFileSchema>;

const promptsFileSchema = z
  .object({
    system: z.string().default("You are an expert translator."),
    default_prompt: z.string().min(1),
    categories: z.record(z.array(z.string())).optional(),
  })
  .catchall(z.unknown());

const tableFileSchema = z.object({
  columns: z
    .object({
      id: z.string().min(1),
      external_ref: z.string().min(1),
      object_ref: z.string().min(1),
      display_key: z.string().min(1),
      source_text: z.string().min(1),
      max_length: z.string().min(1),
      category: z.string().min(1),
    })
    .partial()
    .default({}),
});

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");

const parseWith = <T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  label: string,
): z.output<T> => {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${label} is invalid: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export function validateQualityCriteria(criteria: QualityCriteria): void {
  const total = criteria.dimensions.reduce((sum, dim) => sum + dim.weight, 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigError(
      `Quality dimension weights must sum to 1.0, got ${Number(total.toFixed(4))}`,
    );
  }
  const { approve, reject, criticalFloor } = criteria.thresholds;
  if (reject > approve) {
    throw new ConfigError(
      `Reject threshold (${reject}) must not exceed approve threshold (${approve})`,
    );
  }
  for (const dim of criteria.dimensions) {
    if (dim.critical && dim.minimum < criticalFloor) {
      throw new ConfigError(
        `Dimension "${dim.name}" minimum (${dim.minimum}) is below the critical floor (${criticalFloor})`,
      );
    }
  }
}

export function buildQualityCriteria(raw: unknown): QualityCriteria {
  const data = parseWith(qualityCriteriaFileSchema, raw, "lqa_criteria");
  const criteria: QualityCriteria = {
    dimensions: Object.entries(data.dimensions).map(([name, dim]) => ({
      name,
      weight: dim.weight,
      description: dim.description,
      critical: dim.critical,
      minimum: dim.minimum ?? DEFAULT_CRITICAL_MINIMUM,
    })),
    thresholds: {
      approve: data.thresholds.approve,
      reject: data.thresholds.reject,
      criticalFloor: data.thresholds.critical_floor,
    },
  };
  validateQualityCriteria(criteria);
  return criteria;
}

function buildLanguages(raw: unknown): Record<string, LanguageConfig> {
  const data = parseWith(languagesFileSchema, raw, "languages");
  const languages: Record<string, LanguageConfig> = {};
  for (const entry of data.languages) {
    if (languages[entry.code]) {
      throw new ConfigError(`Language "${entry.code}" is declared twice`);
    }
    languages[entry.code] = {
      code: entry.code,
      name: entry.name,
      bcp47: entry.bcp47,
      nativeName: entry.native_name,
    };
  }
  return languages;
}

export function buildPromptTemplates(raw: unknown): PromptTemplates {
  const data = parseWith(promptsFileSchema, raw, "translation_prompts");
  const templates: Record<string, string> = { default_prompt: data.default_prompt };
  for (const [key, value] of Object.entries(data)) {
    if (key === "system" || key === "categories" || key === "default_prompt") continue;
    if (typeof value === "string") {
      templates[key] = value;
    }
  }

  const categoryMap: Record<string, string> = {};
  const groups = data.categories ?? DEFAULT_CATEGORY_TEMPLATES;
  for (const [templateName, categories] of Object.entries(groups)) {
    // a default group whose template is absent falls back to default_prompt
    if (!templates[templateName] && !data.categories) continue;
    for (const category of categories) {
      categoryMap[category.trim().toLowerCase()] = templateName;
    }
  }

  const prompts: PromptTemplates = {
    system: data.system,
    defaultPrompt: data.default_prompt,
    templates,
    categoryMap,
  };
  validatePromptTemplates(prompts);
  return prompts;
}

function validatePromptTemplates(prompts: PromptTemplates): void {
  for (const [name, template] of Object.entries(prompts.templates)) {
    if (!template.includes("{text}")) {
      throw new ConfigError(`Prompt template "${name}" has no {text} placeholder`);
    }
  }
  for (const [category, templateName] of Object.entries(prompts.categoryMap)) {
    if (!prompts.templates[templateName]) {
      throw new ConfigError(
        `Category "${category}" references unknown prompt template "${templateName}"`,
      );
    }
  }
}

function buildTableColumns(raw: unknown): TableColumnMap {
  const { columns } = parseWith(tableFileSchema, raw ?? {}, "table");
  const resolved: TableColumnMap = {
    id: columns.id ?? DEFAULT_TABLE_COLUMNS.id,
    externalRef: columns.external_ref ?? DEFAULT_TABLE_COLUMNS.externalRef,
    objectRef: columns.object_ref ?? DEFAULT_TABLE_COLUMNS.objectRef,
    displayKey: columns.display_key ?? DEFAULT_TABLE_COLUMNS.displayKey,
    sourceText: columns.source_text ?? DEFAULT_TABLE_COLUMNS.sourceText,
    maxLength: columns.max_length ?? DEFAULT_TABLE_COLUMNS.maxLength,
    category: columns.category ?? DEFAULT_TABLE_COLUMNS.category,
  };
  const names = Object.values(resolved);
  if (new Set(names).size !== names.length) {
    throw new ConfigError("Table column names must be distinct");
  }
  return resolved;
}

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

export interface PipelineConfigSources {
  languages: unknown;
  quality: unknown;
  prompts: unknown;
  table?: unknown;
}

/** Builds a frozen configuration from already-parsed documents. */
export function buildPipelineConfig(
  sources: PipelineConfigSources,
  configDir = "(inline)",
): PipelineConfig {
  return deepFreeze({
    configDir,
    languages: buildLanguages(sources.languages),
    quality: buildQualityCriteria(sources.quality),
    prompts: buildPromptTemplates(sources.prompts),
    table: buildTableColumns(sources.table),
  });
}

async function readYaml(filePath: string, optional = false): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (optional && error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw new ConfigError(`Cannot read ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }
  try {
    return parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }
}

/**
 * Reads languages.yaml, lqa_criteria.yaml, translation_prompts.yaml and the
 * optional table.yaml from `configDir`. Called once per job.
 */
export async function loadPipelineConfig(configDir: string): Promise<PipelineConfig> {
  const dir = path.resolve(configDir);
  const [languages, quality, prompts, table] = await Promise.all([
    readYaml(path.join(dir, "languages.yaml")),
    readYaml(path.join(dir, "lqa_criteria.yaml")),
    readYaml(path.join(dir, "translation_prompts.yaml")),
    readYaml(path.join(dir, "table.yaml"), true),
  ]);
  return buildPipelineConfig({ languages, quality, prompts, table }, dir);
}

export const reloadPipelineConfig = (config: PipelineConfig): Promise<PipelineConfig> =>
  loadPipelineConfig(config.configDir);

export function validatePipelineConfig(config: PipelineConfig): true {
  validateQualityCriteria(config.quality);
  validatePromptTemplates(config.prompts);
  if (!Object.keys(config.languages).length) {
    throw new ConfigError("No languages configured");
  }
  return true;
}

export const getLanguage = (
  config: PipelineConfig,
  code: string,
): LanguageConfig | undefined =>
  Object.prototype.hasOwnProperty.call(config.languages, code)
    ? config.languages[code]
    : undefined;

export function requireLanguage(config: PipelineConfig, code: string): LanguageConfig {
  const language = getLanguage(config, code);
  if (!language) {
    throw new ConfigError(`Unknown language code: ${code}`);
  }
  return language;
}

export function requireLanguages(config: PipelineConfig, codes: readonly string[]): void {
  const unknown = codes.filter((code) => !getLanguage(config, code));
  if (unknown.length) {
    throw new ConfigError(`Unknown language code(s): ${unknown.join(", ")}`);
  }
}

export function selectPromptTemplate(
  prompts: PromptTemplates,
  category?: string | null,
): string {
  const normalized = category?.trim().toLowerCase();
  if (!normalized) return prompts.defaultPrompt;
  const templateName = prompts.categoryMap[normalized];
  return (templateName && prompts.templates[templateName]) || prompts.defaultPrompt;
}

export const dimensionWeights = (criteria: QualityCriteria): Record<string, number> =>
  Object.fromEntries(criteria.dimensions.map((dim) => [dim.name, dim.weight]));

/** Copy of `criteria` with another approve threshold, re-validated. */
export function withApproveThreshold(criteria: QualityCriteria, approve: number): QualityCriteria {
  if (!Number.isFinite(approve) || approve < 0 || approve > 100) {
    throw new ConfigError(`Approve threshold must be between 0 and 100, got ${approve}`);
  }
  const next: QualityCriteria = {
    dimensions: criteria.dimensions,
    thresholds: { ...criteria.thresholds, approve },
  };
  validateQualityCriteria(next);
  return deepFreeze(next);
}
