import type { PromptTemplates } from "../../config/pipelineConfig";
import { selectPromptTemplate } from "../../config/pipelineConfig";

const NO_CONTEXT = "None";
const NO_LIMIT = "No limit";

export interface TranslationPromptInput {
  template: string;
  text: string;
  sourceLang: string;
  targetLang: string;
  targetLangName: string;
  category?: string | null;
  context?: string | null;
  maxLength?: number | null;
}

const PLACEHOLDER_PATTERN = /\{\{|\}\}|\{(\w+)\}/g;

function formatOptional(value: string | null | undefined, fallback: string): string {
  const normalized = value?.trim();
  return normalized && normalized.length ? normalized : fallback;
}

/**
 * Fills `{name}` placeholders of a template. `{{` and `}}` render as literal
 * braces and unknown names are left untouched.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(PLACEHOLDER_PATTERN, (match, name?: string) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    if (name !== undefined && Object.prototype.hasOwnProperty.call(values, name)) {
      return values[name];
    }
    return match;
  });
}

export function buildTranslationPrompt(input: TranslationPromptInput): string {
  return fillTemplate(input.template, {
    source_lang: input.sourceLang,
    target_lang: input.targetLang,
    target_lang_name: input.targetLangName,
    text: input.text,
    category: formatOptional(input.category, NO_CONTEXT),
    context: formatOptional(input.context, NO_CONTEXT),
    max_length:
      typeof input.maxLength === "number" && input.maxLength > 0
        ? String(input.maxLength)
        : NO_LIMIT,
  });
}

export function buildPromptForCategory(
  prompts: PromptTemplates,
  input: Omit<TranslationPromptInput, "template">,
): { system: string; user: string } {
  return {
    system: prompts.system,
    user: buildTranslationPrompt({
      ...input,
      template: selectPromptTemplate(prompts, input.category),
    }),
  };
}
