import { fileURLToPath } from 'node:url';
import { isLogThreshold, LogThreshold } from '../logging/ConsoleLogger.js';

export interface AppConfig {
  llm: {
    apiKey: string;
    baseUrl?: string;
    enabled: boolean;
    extractionModel: string;
    classificationModel: string;
    timeoutMs: number;
    maxTokens: number;
  };
  extraction: {
    maxChunkChars: number;
    retries: number;
    backoffMs: number;
    concurrency: number;
  };
  categorization: {
    concurrency: number;
    retries: number;
    backoffMs: number;
    rulesPath: string;
  };
  insights: {
    topMerchantLimit: number;
  };
  app: {
    port: number;
    logLevel: LogThreshold;
  };
}

export const DEFAULT_CATEGORY_RULES_PATH = fileURLToPath(new URL('../../../config/category-rules.json', import.meta.url));

const readInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const openRouterKey = env.OPENROUTER_API_KEY;
  const apiKey = env.OPENAI_API_KEY ?? openRouterKey ?? '';
  const logLevel = env.LOG_LEVEL ?? 'info';

  return {
    llm: {
      apiKey,
      baseUrl: env.LLM_BASE_URL ?? (env.OPENAI_API_KEY || !openRouterKey ? undefined : 'https://openrouter.ai/api/v1'),
      enabled: env.LLM_ENABLED !== 'false' && apiKey !== '',
      extractionModel: env.LLM_EXTRACTION_MODEL ?? 'gpt-4o-mini',
      classificationModel: env.LLM_CLASSIFICATION_MODEL ?? 'gpt-4o-mini',
      timeoutMs: readInt(env.LLM_TIMEOUT_MS, 25_000),
      maxTokens: readInt(env.LLM_MAX_TOKENS, 8000),
    },
    extraction: {
      maxChunkChars: readInt(env.EXTRACTION_MAX_CHUNK_CHARS, 20_000),
      // A chunk is retried at most once.
      retries: Math.min(1, readInt(env.EXTRACTION_MAX_RETRIES, 1)),
      backoffMs: readInt(env.EXTRACTION_BACKOFF_MS, 500),
      concurrency: readInt(env.EXTRACTION_CONCURRENCY, 2),
    },
    categorization: {
      concurrency: readInt(env.CATEGORIZATION_CONCURRENCY, 4),
      retries: readInt(env.CATEGORIZATION_MAX_RETRIES, 2),
      backoffMs: readInt(env.CATEGORIZATION_BACKOFF_MS, 250),
      rulesPath: env.CATEGORY_RULES_PATH ?? DEFAULT_CATEGORY_RULES_PATH,
    },
    insights: {
      topMerchantLimit: readInt(env.INSIGHTS_TOP_MERCHANTS, 10),
    },
    app: {
      port: readInt(env.PORT, 4000),
      logLevel: isLogThreshold(logLevel) ? logLevel : 'info',
    },
  };
};
