import OpenAI from 'openai';
import type { AppConfig, ModelProvider } from '../config.js';
import { ExternalProviderError, toProviderError } from '../errors.js';
import type { Generator, RetrievedChunk } from '../types/rag.js';
import { logger } from '../util/logger.js';
import { SYSTEM_PROMPT } from './prompt.js';
import { segmentAnswer } from './segmenter.js';

export interface ChatGeneratorOptions {
  name: string;
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
  /** OpenAI-compatible endpoint, e.g. https://api.x.ai/v1 for Grok */
  baseURL?: string;
}

/**
 * Chat-completions generator for OpenAI and OpenAI-compatible APIs.
 */
export class OpenAIChatGenerator implements Generator {
  readonly name: string;
  private readonly openai: OpenAI;

  constructor(private readonly options: ChatGeneratorOptions) {
    if (!options.apiKey) {
      throw new Error(`${options.name} API key is required`);
    }
    this.name = options.name;
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: options.maxRetries ?? 2,
    });
  }

  get model(): string {
    return this.options.model;
  }

  async generate(prompt: string, _retrievedChunks: readonly RetrievedChunk[]): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.openai.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        temperature: this.options.temperature ?? 0.7,
        max_tokens: this.options.maxTokens ?? 1000,
      });
      content = completion.choices[0]?.message.content;
    } catch (error) {
      logger.error(`[Generator] ${this.name} request failed:`, error);
      throw toProviderError('generation', error);
    }

    if (!content || !content.trim()) {
      throw new ExternalProviderError('generation', 'bad_response', `Generation failed: ${this.name} returned no content`);
    }
    return content.trim();
  }
}

export interface ExtractiveGeneratorOptions {
  maxSentences?: number;
}

export const NO_ANSWER_TEXT = 'I could not find a direct answer in the indexed documentation.';

/**
 * Offline generator: answers with claim sentences quoted from the retrieved chunks, taking
 * one sentence from each chunk in turn. Needs no credentials.
 */
export class ExtractiveGenerator implements Generator {
  readonly name = 'demo';
  private readonly maxSentences: number;

  constructor(options: ExtractiveGeneratorOptions = {}) {
    this.maxSentences = options.maxSentences ?? 3;
  }

  async generate(_prompt: string, retrievedChunks: readonly RetrievedChunk[]): Promise<string> {
    const perChunk = retrievedChunks.map((chunk) =>
      segmentAnswer(chunk.text)
        .filter((segment) => segment.isClaim)
        .map((segment) => segment.text)
    );

    const picked: string[] = [];
    const seen = new Set<string>();
    for (let round = 0; picked.length < this.maxSentences; round++) {
      const candidates = perChunk.flatMap((sentences) => (round < sentences.length ? [sentences[round]] : []));
      if (candidates.length === 0) {
        break;
      }
      for (const sentence of candidates) {
        if (picked.length >= this.maxSentences) {
          break;
        }
        if (!seen.has(sentence)) {
          seen.add(sentence);
          picked.push(sentence);
        }
      }
    }

    return picked.length > 0 ? picked.join(' ') : NO_ANSWER_TEXT;
  }
}

type GeneratorConfig = Pick<
  AppConfig,
  'modelProvider' | 'openaiApiKey' | 'grokApiKey' | 'grokApiUrl' | 'modelName' | 'grokModel' | 'temperature' | 'maxTokens' | 'maxRetries'
>;

export interface ProviderStatus {
  available: boolean;
  model: string;
  configKey?: string;
}

export interface ProviderInfo {
  requested: ModelProvider;
  active: ModelProvider;
  providers: Record<ModelProvider, ProviderStatus>;
}

function keyFor(config: GeneratorConfig, provider: ModelProvider): string | undefined {
  switch (provider) {
    case 'openai':
      return config.openaiApiKey;
    case 'grok':
      return config.grokApiKey;
    case 'demo':
      return undefined;
  }
}

export function getProviderInfo(config: GeneratorConfig): ProviderInfo {
  const providers: Record<ModelProvider, ProviderStatus> = {
    openai: { available: Boolean(config.openaiApiKey), model: config.modelName, configKey: 'OPENAI_API_KEY' },
    grok: { available: Boolean(config.grokApiKey), model: config.grokModel, configKey: 'GROK_API_KEY' },
    demo: { available: true, model: 'extractive' },
  };
  return {
    requested: config.modelProvider,
    active: providers[config.modelProvider].available ? config.modelProvider : 'demo',
    providers,
  };
}

/**
 * Build the configured generator. A provider without an API key falls back to the
 * extractive demo generator with a warning.
 */
export function createGenerator(config: GeneratorConfig): Generator {
  const provider = config.modelProvider;
  if (provider === 'demo') {
    return new ExtractiveGenerator();
  }

  const apiKey = keyFor(config, provider);
  if (!apiKey) {
    logger.warn(`[Generator] No API key for ${provider}; falling back to the demo generator`);
    return new ExtractiveGenerator();
  }

  if (provider === 'grok') {
    return new OpenAIChatGenerator({
      name: 'grok',
      apiKey,
      model: config.grokModel,
      baseURL: config.grokApiUrl,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      maxRetries: config.maxRetries,
    });
  }

  return new OpenAIChatGenerator({
    name: 'openai',
    apiKey,
    model: config.modelName,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    maxRetries: config.maxRetries,
  });
}
