import type { EmbeddingsProvider } from './types.js';
import { tokenize } from '../util/text.js';

const DEFAULT_DIMENSIONS = 384;

/**
 * 32-bit FNV-1a.
 */
function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

/**
 * Offline embeddings: every token and adjacent token pair is hashed into a signed
 * bucket of a fixed-size vector, which is then scaled to unit length. Texts that
 * share vocabulary end up close under cosine distance. Needs no network or model files.
 */
export class HashingEmbeddings implements EmbeddingsProvider {
  readonly name = 'hashing';

  constructor(readonly dimensions: number = DEFAULT_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions < 8) {
      throw new Error('HashingEmbeddings needs at least 8 dimensions');
    }
  }

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);

    const features = [...tokens];
    for (let i = 0; i + 1 < tokens.length; i++) {
      features.push(`${tokens[i]} ${tokens[i + 1]}`);
    }

    for (const feature of features) {
      const hash = fnv1a(feature);
      const index = hash % this.dimensions;
      // High bit picks the sign
      vector[index] += hash & 0x80000000 ? -1 : 1;
    }

    const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    if (magnitude === 0) {
      // No tokens: fall back to a fixed direction
      const uniform = 1 / Math.sqrt(this.dimensions);
      return vector.map(() => uniform);
    }
    return vector.map((v) => v / magnitude);
  }
}
