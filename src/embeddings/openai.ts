import OpenAI from 'openai';
import type { EmbeddingsProvider } from './types.js';
import { ExternalProviderError, toProviderError } from '../errors.js';
import { logger } from '../util/logger.js';

const EMBEDDING_MODEL = 'text-embedding-3-small';
const MAX_CACHE_ENTRIES = 1000;

export interface OpenAIEmbeddingsOptions {
  maxRetries?: number;
  baseURL?: string;
}

export class OpenAIEmbeddings implements EmbeddingsProvider {
  private openai: OpenAI;
  private cache: Map<string, number[]>;
  readonly dimensions = 1536; // text-embedding-3-small dimensions
  readonly name = `openai:${EMBEDDING_MODEL}`;

  constructor(apiKey: string, options: OpenAIEmbeddingsOptions = {}) {
    if (!apiKey) {
      throw new Error('OpenAI API key is required');
    }
    this.openai = new OpenAI({ apiKey, maxRetries: options.maxRetries, baseURL: options.baseURL });
    this.cache = new Map();
  }

  async embed(text: string): Promise<number[]> {
    const cleanText = text.trim();
    if (!cleanText) {
      throw new Error('Input text must be a non-empty string');
    }

    // Check cache first
    const cacheKey = cleanText.slice(0, 1000); // Limit cache key size
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }

    let embedding: number[] | undefined;
    try {
      const response = await this.openai.embeddings.create({
        model: EMBEDDING_MODEL,
        input: cleanText,
        dimensions: this.dimensions,
      });
      embedding = response.data[0]?.embedding;
    } catch (error) {
      logger.error('[OpenAIEmbeddings] Error generating embedding:', error);
      throw toProviderError('embedding', error);
    }

    if (!embedding || embedding.length !== this.dimensions) {
      throw new ExternalProviderError('embedding', 'bad_response', 'Embedding failed: No embedding returned from OpenAI');
    }

    this.cache.set(cacheKey, embedding);

    // Evict the oldest entry once the cache is full
    if (this.cache.size > MAX_CACHE_ENTRIES) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }

    return embedding;
  }
}
