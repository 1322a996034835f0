// server/config/env.ts
import 'dotenv/config';
import { z } from 'zod';

import { ConfigError } from '../services/errors';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalSecret = z
  .string()
  .trim()
  .transform((value) => (value.length ? value : undefined))
  .optional();

const schema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  LOG_LEVEL: z.string().default('info'),
  PORT: positiveInt(8080),
  HOST: z.string().default('0.0.0.0'),
  OPENAI_API_KEY: optionalSecret,
  TRANSLATION_MODEL: z.string().trim().min(1).default('gpt-4o'),
  QUALITY_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  TRANSLATION_CONFIG_DIR: z.string().trim().min(1).default('config'),
  PHRASE_API_TOKEN: optionalSecret,
  PHRASE_PROJECT_ID: optionalSecret,
  PHRASE_BASE_URL: z.string().url().default('https://api.phrase.com/v2'),
  PROVIDER_MAX_RETRIES: positiveInt(3),
  LANGUAGE_CONCURRENCY: positiveInt(1),
  CLIENT_ORIGIN: optionalSecret,
});

export type AppEnv = z.infer<typeof schema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export function requireOpenAiKey(env: AppEnv): string {
  if (!env.OPENAI_API_KEY) {
    throw new ConfigError('OPENAI_API_KEY is required to call the translation provider');
  }
  return env.OPENAI_API_KEY;
}

export function requirePhraseCredentials(env: AppEnv): {
  token: string;
  projectId: string;
  baseUrl: string;
} {
  if (!env.PHRASE_API_TOKEN) {
    throw new ConfigError('PHRASE_API_TOKEN is required for TMS operations');
  }
  if (!env.PHRASE_PROJECT_ID) {
    throw new ConfigError('PHRASE_PROJECT_ID is required for TMS operations');
  }
  return {
    token: env.PHRASE_API_TOKEN,
    projectId: env.PHRASE_PROJECT_ID,
    baseUrl: env.PHRASE_BASE_URL,
  };
}
