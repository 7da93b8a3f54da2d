/**
 * Menu pipeline configuration
 *
 * Builds the explicit config objects handed to the menu processor and the
 * places client. Nothing downstream reads process.env; every external call
 * gets its timeout from here and there are no built-in timeout defaults.
 */

import { z } from 'zod';
import { ConfigError } from '../lib/config/config-validator.js';
import type { RetryPolicy } from '../lib/reliability/retry-handler.js';

export const MODEL_TIERS = ['classification', 'analysis', 'aggregation'] as const;
export type ModelTier = typeof MODEL_TIERS[number];

export interface ModelTierConfig {
  model: string;
  maxOutputTokens: number;
  timeoutMs: number;
}

/** Pool sizes of the three nested worker pools */
export interface WorkerCounts {
  restaurants: number;
  classification: number;
  analysis: number;
}

export interface ImagePriorityRule {
  /** Substring matched against the image URL */
  pattern: string;
  /** Lower ranks are processed first */
  rank: number;
}

export interface MenuPipelineConfig {
  workers: WorkerCounts;
  models: Record<ModelTier, ModelTierConfig>;
  imagePriority: ImagePriorityRule[];
  retry: RetryPolicy;
}

export interface PlacesConfig {
  apiToken: string | undefined;
  actorId: string;
  baseUrl: string;
  timeoutMs: number;
  maxPlaces: number;
  maxImages: number;
  language: string;
  searchTerm: string;
  retry: RetryPolicy;
}

export const DEFAULT_IMAGE_PRIORITY = 'menu:0,gps-cs-s:1';

const positiveInt = z.coerce.number().int().positive();

const PipelineEnvSchema = z.object({
  LLM_TIMEOUT_MS: positiveInt,
  LLM_CLASSIFICATION_TIMEOUT_MS: positiveInt.optional(),
  LLM_ANALYSIS_TIMEOUT_MS: positiveInt.optional(),
  LLM_AGGREGATION_TIMEOUT_MS: positiveInt.optional(),

  LLM_CLASSIFICATION_MODEL: z.string().min(1).default('gpt-4.1-mini'),
  LLM_ANALYSIS_MODEL: z.string().min(1).default('gpt-4.1'),
  LLM_AGGREGATION_MODEL: z.string().min(1).default('gpt-4.1'),

  LLM_CLASSIFICATION_MAX_TOKENS: positiveInt.default(1000),
  LLM_ANALYSIS_MAX_TOKENS: positiveInt.default(5000),
  LLM_AGGREGATION_MAX_TOKENS: positiveInt.default(3000),

  MENU_RESTAURANT_WORKERS: positiveInt.default(3),
  MENU_CLASSIFICATION_WORKERS: positiveInt.default(3),
  MENU_ANALYSIS_WORKERS: positiveInt.default(2),

  IMAGE_PRIORITY_RULES: z.string().default(DEFAULT_IMAGE_PRIORITY),

  LLM_RETRY_MAX_ATTEMPTS: positiveInt.default(2),
  LLM_RETRY_BACKOFF_MS: z.string().default('0,1000'),
});

const PlacesEnvSchema = z.object({
  PLACES_TIMEOUT_MS: positiveInt,
  APIFY_API_TOKEN: z.string().optional(),
  APIFY_ACTOR_ID: z.string().min(1).default('compass~crawler-google-places'),
  APIFY_BASE_URL: z.string().url().default('https://api.apify.com'),
  PLACES_MAX_RESULTS: positiveInt.default(10),
  PLACES_MAX_IMAGES: positiveInt.default(5),
  PLACES_LANGUAGE: z.string().min(2).default('en'),
  PLACES_RETRY_MAX_ATTEMPTS: positiveInt.default(1),
  PLACES_RETRY_BACKOFF_MS: z.string().default('0'),
});

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: NodeJS.ProcessEnv, scope: string): z.infer<S> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${scope} configuration: ${problems}`);
  }
  return result.data;
}

/**
 * "menu:0,gps-cs-s:1" -> [{ pattern: 'menu', rank: 0 }, { pattern: 'gps-cs-s', rank: 1 }]
 */
export function parseImagePriorityRules(raw: string): ImagePriorityRule[] {
  return raw
    .split(',')
    .map(part => part.trim())
    .filter(Boolean)
    .map(part => {
      const sep = part.lastIndexOf(':');
      const pattern = sep > 0 ? part.slice(0, sep).trim() : '';
      const rank = sep > 0 ? Number(part.slice(sep + 1)) : NaN;
      if (!pattern || !Number.isInteger(rank) || rank < 0) {
        throw new ConfigError(`Invalid image priority rule "${part}" (expected <pattern>:<rank>)`);
      }
      return { pattern, rank };
    });
}

export function parseBackoffSchedule(raw: string): number[] {
  const schedule = raw.split(',').map(part => Number(part.trim()));
  if (schedule.some(ms => !Number.isFinite(ms) || ms < 0)) {
    throw new ConfigError(`Invalid backoff schedule "${raw}"`);
  }
  return schedule;
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): MenuPipelineConfig {
  const e = parseEnv(PipelineEnvSchema, env, 'menu pipeline');

  return {
    workers: {
      restaurants: e.MENU_RESTAURANT_WORKERS,
      classification: e.MENU_CLASSIFICATION_WORKERS,
      analysis: e.MENU_ANALYSIS_WORKERS,
    },
    models: {
      classification: {
        model: e.LLM_CLASSIFICATION_MODEL,
        maxOutputTokens: e.LLM_CLASSIFICATION_MAX_TOKENS,
        timeoutMs: e.LLM_CLASSIFICATION_TIMEOUT_MS ?? e.LLM_TIMEOUT_MS,
      },
      analysis: {
        model: e.LLM_ANALYSIS_MODEL,
        maxOutputTokens: e.LLM_ANALYSIS_MAX_TOKENS,
        timeoutMs: e.LLM_ANALYSIS_TIMEOUT_MS ?? e.LLM_TIMEOUT_MS,
      },
      aggregation: {
        model: e.LLM_AGGREGATION_MODEL,
        maxOutputTokens: e.LLM_AGGREGATION_MAX_TOKENS,
        timeoutMs: e.LLM_AGGREGATION_TIMEOUT_MS ?? e.LLM_TIMEOUT_MS,
      },
    },
    imagePriority: parseImagePriorityRules(e.IMAGE_PRIORITY_RULES),
    retry: {
      maxAttempts: e.LLM_RETRY_MAX_ATTEMPTS,
      backoffMs: parseBackoffSchedule(e.LLM_RETRY_BACKOFF_MS),
    },
  };
}

export function loadPlacesConfig(env: NodeJS.ProcessEnv = process.env): PlacesConfig {
  const e = parseEnv(PlacesEnvSchema, env, 'places');

  return {
    apiToken: e.APIFY_API_TOKEN || undefined,
    actorId: e.APIFY_ACTOR_ID,
    baseUrl: e.APIFY_BASE_URL,
    timeoutMs: e.PLACES_TIMEOUT_MS,
    maxPlaces: e.PLACES_MAX_RESULTS,
    maxImages: e.PLACES_MAX_IMAGES,
    language: e.PLACES_LANGUAGE,
    searchTerm: 'restaurants',
    retry: {
      maxAttempts: e.PLACES_RETRY_MAX_ATTEMPTS,
      backoffMs: parseBackoffSchedule(e.PLACES_RETRY_BACKOFF_MS),
    },
  };
}
