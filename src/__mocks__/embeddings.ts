/**
 * Mock embeddings providers for testing
 */

import type { EmbeddingsProvider } from '../embeddings/types.js';

/**
 * Mock embeddings provider that throws errors (for error handling testing)
 */
export function createFailingEmbeddings(dimensions: number = 384, message = 'Embeddings service unavailable'): EmbeddingsProvider {
  return {
    dimensions,
    name: 'failing',
    embed: async (): Promise<number[]> => {
      throw new Error(message);
    },
  };
}
