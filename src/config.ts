import dotenv from 'dotenv';
import { z } from 'zod';
import feedList from '../config/feeds.json';
import { ConfigError, formatZodError } from './utils/errors';

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const intFromEnv = (fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(min).max(max).default(fallback),
  );

const feedSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
});

// Category order is the order feeds are processed in
export const feedCategoriesSchema = z.record(
  z.string().min(1),
  z.array(feedSourceSchema),
);

const envSchema = z
  .object({
    RELEVANCE_THRESHOLD: intFromEnv(4, 0, 10),
    TITLE_MULTIPLIER: intFromEnv(2),
    NORMALIZATION_DIVISOR: intFromEnv(6),
    KEYWORD_TIERS_PATH: optionalString,

    ENTRIES_PER_FEED: intFromEnv(3),
    FEED_TIMEOUT_MS: intFromEnv(15000),

    AI_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
    AI_API_KEY: optionalString,
    OPENAI_API_KEY: optionalString,
    AI_MODEL: z.string().min(1).default('llama3.2'),
    AI_TEMPERATURE: z.preprocess(
      blankToUndefined,
      z.coerce.number().min(0).max(2).default(0.2),
    ),
    AI_TIMEOUT_MS: intFromEnv(120000),

    SAM_GOV_API_KEY: optionalString,
    SAM_TIMEOUT_MS: intFromEnv(30000),
    SAM_RESULT_LIMIT: intFromEnv(10),
    SAM_WINDOW_DAYS: intFromEnv(7),

    OUTPUT_DIR: z.string().min(1).default('output'),

    BOT_TOKEN: optionalString,
    DIGEST_CHAT_ID: optionalString,
    DIGEST_CRON: z.string().min(1).default('0 7 * * *'),

    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
  })
  .refine((env) => !env.BOT_TOKEN || env.DIGEST_CHAT_ID, {
    message: 'DIGEST_CHAT_ID is required when BOT_TOKEN is set',
    path: ['DIGEST_CHAT_ID'],
  });

export interface FeedSource {
  name: string;
  url: string;
}

export interface FeedCategory {
  category: string;
  feeds: FeedSource[];
}

export interface AppConfig {
  scoring: {
    relevanceThreshold: number;
    titleMultiplier: number;
    normalizationDivisor: number;
  };
  keywordTiersPath?: string;
  feeds: {
    entriesPerFeed: number;
    timeoutMs: number;
    categories: FeedCategory[];
  };
  ai: {
    baseUrl: string;
    apiKey: string;
    model: string;
    temperature: number;
    timeoutMs: number;
  };
  sam: {
    apiKey?: string;
    timeoutMs: number;
    limit: number;
    windowDays: number;
  };
  outputDir: string;
  telegram?: {
    botToken: string;
    chatId: string;
  };
  schedule: string;
  logLevel: string;
}

export function parseFeedCategories(input: unknown): FeedCategory[] {
  const result = feedCategoriesSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid feed list: ${formatZodError(result.error)}`,
      result.error.errors,
    );
  }
  return Object.entries(result.data).map(([category, feeds]) => ({
    category,
    feeds,
  }));
}

/**
 * Builds the application config from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  feeds: unknown = feedList,
): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${formatZodError(result.error)}`,
      result.error.errors,
    );
  }
  const parsed = result.data;

  return {
    scoring: {
      relevanceThreshold: parsed.RELEVANCE_THRESHOLD,
      titleMultiplier: parsed.TITLE_MULTIPLIER,
      normalizationDivisor: parsed.NORMALIZATION_DIVISOR,
    },
    keywordTiersPath: parsed.KEYWORD_TIERS_PATH,
    feeds: {
      entriesPerFeed: parsed.ENTRIES_PER_FEED,
      timeoutMs: parsed.FEED_TIMEOUT_MS,
      categories: parseFeedCategories(feeds),
    },
    ai: {
      baseUrl: parsed.AI_BASE_URL,
      // Ollama ignores the key but the SDK requires one
      apiKey: parsed.AI_API_KEY ?? parsed.OPENAI_API_KEY ?? 'ollama',
      model: parsed.AI_MODEL,
      temperature: parsed.AI_TEMPERATURE,
      timeoutMs: parsed.AI_TIMEOUT_MS,
    },
    sam: {
      apiKey: parsed.SAM_GOV_API_KEY,
      timeoutMs: parsed.SAM_TIMEOUT_MS,
      limit: parsed.SAM_RESULT_LIMIT,
      windowDays: parsed.SAM_WINDOW_DAYS,
    },
    outputDir: parsed.OUTPUT_DIR,
    telegram:
      parsed.BOT_TOKEN && parsed.DIGEST_CHAT_ID
        ? { botToken: parsed.BOT_TOKEN, chatId: parsed.DIGEST_CHAT_ID }
        : undefined,
    schedule: parsed.DIGEST_CRON,
    logLevel: parsed.LOG_LEVEL,
  };
}
