/**
 * Config — environment-driven settings
 *
 * Reads process.env (populated by dotenv at the entry points) and applies
 * defaults. Blank values count as unset.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

const blank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const EnvSchema = z.object({
  PORT: blank(z.coerce.number().int().positive().default(3001)),
  CORS_ORIGINS: blank(z.string().default('*')),

  VENDOR_API_URL: blank(z.string().url().default('http://localhost:4010')),
  VENDOR_TIMEOUT_MS: blank(z.coerce.number().int().positive().default(30000)),

  LLM_API_KEY: blank(z.string().optional()),
  OPENROUTER_API_KEY: blank(z.string().optional()),
  OPENAI_API_KEY: blank(z.string().optional()),
  LLM_BASE_URL: blank(z.string().url().optional()),
  LLM_MODEL: blank(z.string().optional()),
  LLM_FINAL_MODEL: blank(z.string().optional()),

  TRANSLATE_API_URL: blank(z.string().url().default('https://translate.googleapis.com/translate_a/single')),
  TRANSLATE_MAX_PER_MINUTE: blank(z.coerce.number().int().positive().default(25)),

  SESSION_TTL_MS: blank(z.coerce.number().int().positive().default(24 * 60 * 60 * 1000)),
  SESSION_SWEEP_INTERVAL_MS: blank(z.coerce.number().int().positive().default(60 * 60 * 1000)),
});

export interface LLMSettings {
  apiKey?: string;
  baseUrl: string;
  model: string;
  finalModel: string;
}

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  vendor: {
    baseUrl: string;
    timeoutMs: number;
  };
  llm: LLMSettings;
  translation: {
    apiUrl: string;
    maxPerMinute: number;
  };
  sessions: {
    ttlMs: number;
    sweepIntervalMs: number;
  };
}

const OPENROUTER_URL = 'https://openrouter.ai/api/v1';
const OPENAI_URL = 'https://api.openai.com/v1';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw ConfigError.invalid(detail);
  }
  const e = parsed.data;

  // OpenRouter takes precedence when its key is the one supplied
  const viaOpenRouter = !e.LLM_API_KEY && !!e.OPENROUTER_API_KEY;
  const apiKey = e.LLM_API_KEY ?? e.OPENROUTER_API_KEY ?? e.OPENAI_API_KEY;
  const baseUrl = e.LLM_BASE_URL ?? (viaOpenRouter ? OPENROUTER_URL : OPENAI_URL);
  const model = e.LLM_MODEL ?? (viaOpenRouter ? 'openai/gpt-4o' : 'gpt-4o');
  const finalModel = e.LLM_FINAL_MODEL ?? (viaOpenRouter ? 'openai/gpt-4.1' : model);

  return {
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    vendor: {
      baseUrl: e.VENDOR_API_URL.replace(/\/+$/, ''),
      timeoutMs: e.VENDOR_TIMEOUT_MS,
    },
    llm: { apiKey, baseUrl, model, finalModel },
    translation: {
      apiUrl: e.TRANSLATE_API_URL,
      maxPerMinute: e.TRANSLATE_MAX_PER_MINUTE,
    },
    sessions: {
      ttlMs: e.SESSION_TTL_MS,
      sweepIntervalMs: e.SESSION_SWEEP_INTERVAL_MS,
    },
  };
}
