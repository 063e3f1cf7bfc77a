import type { AppConfig } from '../config.js';
import type { EmbeddingsProvider } from './types.js';
import { OpenAIEmbeddings } from './openai.js';
import { HashingEmbeddings } from './hashing.js';
import { ConfigError } from '../errors.js';

export type { EmbeddingsProvider } from './types.js';
export { OpenAIEmbeddings } from './openai.js';
export { HashingEmbeddings } from './hashing.js';

export function createEmbeddings(
  config: Pick<AppConfig, 'embeddingsProvider' | 'openaiApiKey' | 'maxRetries'>
): EmbeddingsProvider {
  if (config.embeddingsProvider === 'openai') {
    if (!config.openaiApiKey) {
      throw new ConfigError(['EMBEDDINGS_PROVIDER: openai embeddings require OPENAI_API_KEY']);
    }
    return new OpenAIEmbeddings(config.openaiApiKey, { maxRetries: config.maxRetries });
  }
  return new HashingEmbeddings();
}
