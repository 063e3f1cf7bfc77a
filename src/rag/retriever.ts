import { ExternalProviderError, toProviderError } from '../errors.js';
import type { RetrievedChunk, Retriever } from '../types/rag.js';
import { logger } from '../util/logger.js';

/** The part of ChunkStore the retriever needs */
export interface ChunkSearcher {
  searchByText(query: string, limit: number): Promise<RetrievedChunk[]>;
}

export interface RetrievalOptions {
  /** Hits scoring below this cosine similarity are dropped */
  minScore?: number;
}

/**
 * Retriever over the vector store. The normalized query and its expansions are embedded
 * together as one search text.
 */
export class VectorStoreRetriever implements Retriever {
  private readonly minScore: number;

  constructor(
    private readonly store: ChunkSearcher,
    options: RetrievalOptions = {}
  ) {
    this.minScore = options.minScore ?? 0;
  }

  async retrieve(normalizedQuery: string, expansionTerms: readonly string[], k: number): Promise<RetrievedChunk[]> {
    const searchText = [normalizedQuery, ...expansionTerms].join(' ').trim();
    if (!searchText) {
      return [];
    }

    logger.debug(`[VectorStoreRetriever] Retrieving ${k} chunks for: ${searchText}`);

    let results: RetrievedChunk[];
    try {
      results = await this.store.searchByText(searchText, k);
    } catch (error) {
      logger.error('[VectorStoreRetriever] Search failed:', error);
      if (error instanceof ExternalProviderError && error.stage !== 'retrieval') {
        throw new ExternalProviderError('retrieval', error.kind, `Retrieval failed: ${error.message}`, { cause: error });
      }
      throw toProviderError('retrieval', error);
    }

    const kept = results.filter((chunk) => chunk.score >= this.minScore).slice(0, k);
    logger.debug(`[VectorStoreRetriever] Kept ${kept.length} of ${results.length} results (minScore ${this.minScore})`);
    return kept;
  }
}
