import { join } from 'path';
import { homedir } from 'os';
import { mkdir } from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { UnsupportedClaimPolicy } from './types/rag.js';
import { logger } from './util/logger.js';
import { safeJsonParse } from './util/security.js';

export type ModelProvider = 'openai' | 'grok' | 'demo';
export type EmbeddingsProviderName = 'openai' | 'hashing';

export interface NormalizerSettings {
  caseFold: boolean;
  stripPunctuation: boolean;
  synonymExpand: boolean;
}

export interface CitationSettings {
  policy: UnsupportedClaimPolicy;
  overlapThreshold: number;
  maxCitationsPerSegment: number;
}

export interface AppConfig {
  modelProvider: ModelProvider;
  openaiApiKey?: string;
  grokApiKey?: string;
  grokApiUrl: string;
  modelName: string;
  grokModel: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
  embeddingsProvider: EmbeddingsProviderName;
  dataDir: string;
  vectorDbPath: string;
  chunkSize: number;
  chunkOverlap: number;
  retrievalK: number;
  minRelevanceScore: number;
  maxAnswerLength: number;
  searchCacheSize: number;
  normalizer: NormalizerSettings;
  citation: CitationSettings;
  documentationSources: string[];
}

export const DEFAULT_DATA_DIR = join(homedir(), '.cited-docs-assistant');

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

/**
 * DOCUMENTATION_SOURCES accepts either a JSON array or a comma-separated list.
 */
export function parseSourceList(raw: string | undefined): string[] {
  if (!raw || !raw.trim()) {
    return [];
  }
  const trimmed = raw.trim();
  if (trimmed.startsWith('[')) {
    return safeJsonParse(trimmed, z.array(z.string())).map((s) => s.trim()).filter(Boolean);
  }
  return trimmed
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

const EnvSchema = z
  .object({
    MODEL_PROVIDER: z.enum(['openai', 'grok', 'demo']).default('openai'),
    OPENAI_API_KEY: optionalSecret,
    GROK_API_KEY: optionalSecret,
    GROK_API_URL: z.string().url().default('https://api.x.ai/v1'),
    MODEL_NAME: z.string().min(1).default('gpt-4o-mini'),
    GROK_MODEL: z.string().min(1).default('grok-beta'),
    TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    MAX_TOKENS: z.coerce.number().int().positive().default(1000),
    MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
    EMBEDDINGS_PROVIDER: z.enum(['openai', 'hashing']).optional(),
    DATA_DIR: z.string().min(1).optional(),
    CHUNK_SIZE: z.coerce.number().int().min(100).default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
    RETRIEVAL_K: z.coerce.number().int().min(1).max(50).default(4),
    MIN_RELEVANCE_SCORE: z.coerce.number().min(-1).max(1).default(0),
    MAX_ANSWER_LENGTH: z.coerce.number().int().min(100).default(2000),
    SEARCH_CACHE_SIZE: z.coerce.number().int().min(1).default(1000),
    UNSUPPORTED_CLAIM_POLICY: z.enum(['flag', 'redact', 'reject']).default('flag'),
    CITATION_OVERLAP_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.5),
    MAX_CITATIONS_PER_SEGMENT: z.coerce.number().int().min(1).max(20).default(3),
    QUERY_CASE_FOLD: booleanFlag.default('true'),
    QUERY_STRIP_PUNCTUATION: booleanFlag.default('true'),
    QUERY_SYNONYM_EXPAND: booleanFlag.default('true'),
    DOCUMENTATION_SOURCES: z.string().optional(),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

/**
 * Build the configuration from environment variables without touching the filesystem.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = result.data;

  let documentationSources: string[];
  try {
    documentationSources = parseSourceList(e.DOCUMENTATION_SOURCES);
  } catch (error) {
    throw new ConfigError([`DOCUMENTATION_SOURCES: ${error instanceof Error ? error.message : String(error)}`]);
  }

  const dataDir = e.DATA_DIR ?? DEFAULT_DATA_DIR;

  return {
    modelProvider: e.MODEL_PROVIDER,
    openaiApiKey: e.OPENAI_API_KEY,
    grokApiKey: e.GROK_API_KEY,
    grokApiUrl: e.GROK_API_URL,
    modelName: e.MODEL_NAME,
    grokModel: e.GROK_MODEL,
    temperature: e.TEMPERATURE,
    maxTokens: e.MAX_TOKENS,
    maxRetries: e.MAX_RETRIES,
    embeddingsProvider: e.EMBEDDINGS_PROVIDER ?? (e.OPENAI_API_KEY ? 'openai' : 'hashing'),
    dataDir,
    vectorDbPath: join(dataDir, 'vectors'),
    chunkSize: e.CHUNK_SIZE,
    chunkOverlap: e.CHUNK_OVERLAP,
    retrievalK: e.RETRIEVAL_K,
    minRelevanceScore: e.MIN_RELEVANCE_SCORE,
    maxAnswerLength: e.MAX_ANSWER_LENGTH,
    searchCacheSize: e.SEARCH_CACHE_SIZE,
    normalizer: {
      caseFold: e.QUERY_CASE_FOLD,
      stripPunctuation: e.QUERY_STRIP_PUNCTUATION,
      synonymExpand: e.QUERY_SYNONYM_EXPAND,
    },
    citation: {
      policy: e.UNSUPPORTED_CLAIM_POLICY,
      overlapThreshold: e.CITATION_OVERLAP_THRESHOLD,
      maxCitationsPerSegment: e.MAX_CITATIONS_PER_SEGMENT,
    },
    documentationSources,
  };
}

/**
 * Deep-freeze a config so it stays immutable for the life of the process.
 */
export function freezeConfig(config: AppConfig): Readonly<AppConfig> {
  Object.freeze(config.normalizer);
  Object.freeze(config.citation);
  Object.freeze(config.documentationSources);
  return Object.freeze(config);
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<Readonly<AppConfig>> {
  logger.debug('[Config] Loading configuration');

  const config = parseConfig(env);

  if (config.modelProvider === 'openai' && !config.openaiApiKey) {
    logger.warn('[Config] MODEL_PROVIDER is openai but OPENAI_API_KEY is not set; answers will use the demo generator');
  }
  if (config.modelProvider === 'grok' && !config.grokApiKey) {
    logger.warn('[Config] MODEL_PROVIDER is grok but GROK_API_KEY is not set; answers will use the demo generator');
  }
  if (config.embeddingsProvider === 'openai' && !config.openaiApiKey) {
    throw new ConfigError(['EMBEDDINGS_PROVIDER: openai embeddings require OPENAI_API_KEY']);
  }

  try {
    logger.debug(`[Config] Creating data directory: ${config.dataDir}`);
    await mkdir(config.vectorDbPath, { recursive: true });
  } catch (error) {
    logger.error('[Config] Error creating data directory:', error);
    throw error;
  }

  logger.debug('[Config] Configuration loaded:', {
    ...config,
    openaiApiKey: config.openaiApiKey ? '***' : undefined,
    grokApiKey: config.grokApiKey ? '***' : undefined,
  });

  return freezeConfig(config);
}
