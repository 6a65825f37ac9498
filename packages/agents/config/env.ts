// Environment configuration — parsed and validated once per entry point
// Entry points import 'dotenv/config' before calling loadConfig()

import { z } from 'zod';
import { ConfigError } from '../types/errors.js';

const intFrom = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const boolFrom = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(fallback ? 'true' : 'false')
    .transform(v => v === 'true' || v === '1' || v === 'yes');

export const EnvSchema = z.object({
  PORT: intFrom(8000, 1),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  ANTHROPIC_API_KEY: z.string().optional(),
  MARKET_INTEL_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  LLM_MAX_TOKENS: intFrom(1024, 1),

  TAVILY_API_KEY: z.string().optional(),
  TAVILY_BASE_URL: z.string().url().default('https://api.tavily.com'),
  NEWS_RATE_LIMIT: intFrom(60, 1),       // requests per minute
  NEWS_CACHE_TTL: intFrom(300),          // seconds, 0 disables caching
  MAX_ARTICLES: intFrom(5, 1),

  STAGE_TIMEOUT_MS: intFrom(60_000, 1),
  RUN_RETENTION_MS: intFrom(15 * 60_000),
  RUN_RETENTION_COUNT: intFrom(100),
  SSE_KEEPALIVE_MS: intFrom(15_000, 1),
  INCLUDE_VOICE_DEFAULT: boolFrom(true),
});

export type Env = z.infer<typeof EnvSchema>;

export interface MarketIntelConfig {
  server: { port: number; host: string; keepAliveMs: number };
  logLevel: Env['LOG_LEVEL'];
  llm: { apiKey?: string; model: string; maxTokens: number };
  news: { apiKey?: string; baseUrl: string; rateLimit: number; cacheTtl: number; maxArticles: number };
  pipeline: { stageTimeoutMs: number; includeVoiceDefault: boolean };
  retention: { maxAgeMs: number; maxCount: number };
}

/**
 * Parse configuration from the given environment (defaults to process.env).
 * Empty strings are treated as unset so `.env` placeholders fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MarketIntelConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration — ${issues}`);
  }

  const e = parsed.data;
  return {
    server: { port: e.PORT, host: e.HOST, keepAliveMs: e.SSE_KEEPALIVE_MS },
    logLevel: e.LOG_LEVEL,
    llm: { apiKey: e.ANTHROPIC_API_KEY, model: e.MARKET_INTEL_MODEL, maxTokens: e.LLM_MAX_TOKENS },
    news: {
      apiKey: e.TAVILY_API_KEY,
      baseUrl: e.TAVILY_BASE_URL,
      rateLimit: e.NEWS_RATE_LIMIT,
      cacheTtl: e.NEWS_CACHE_TTL,
      maxArticles: e.MAX_ARTICLES,
    },
    pipeline: { stageTimeoutMs: e.STAGE_TIMEOUT_MS, includeVoiceDefault: e.INCLUDE_VOICE_DEFAULT },
    retention: { maxAgeMs: e.RUN_RETENTION_MS, maxCount: e.RUN_RETENTION_COUNT },
  };
}
