import { VectorStoreRetriever, type ChunkSearcher } from './retriever.js';
import { ExternalProviderError } from '../errors.js';
import type { RetrievedChunk } from '../types/rag.js';

function chunk(id: string, score: number): RetrievedChunk {
  return { id, text: `Text of ${id}`, sourceUrl: id.split('#')[0], score };
}

function searcher(results: RetrievedChunk[]) {
  return { searchByText: vi.fn<ChunkSearcher['searchByText']>().mockResolvedValue(results) };
}

describe('VectorStoreRetriever', () => {
  it('should search with the normalized query and its expansions', async () => {
    const store = searcher([chunk('docs/a.md#0', 0.8)]);
    const retriever = new VectorStoreRetriever(store);

    const results = await retriever.retrieve('initialize chroma', ['chromadb', 'init'], 4);

    expect(store.searchByText).toHaveBeenCalledWith('initialize chroma chromadb init', 4);
    expect(results.map((r) => r.id)).toEqual(['docs/a.md#0']);
  });

  it('should not search for an empty query', async () => {
    const store = searcher([chunk('docs/a.md#0', 0.8)]);
    const retriever = new VectorStoreRetriever(store);

    expect(await retriever.retrieve('', [], 4)).toEqual([]);
    expect(store.searchByText).not.toHaveBeenCalled();
  });

  it('should drop hits below the minimum score', async () => {
    const store = searcher([chunk('docs/a.md#0', 0.8), chunk('docs/b.md#0', 0.3), chunk('docs/c.md#0', 0.5)]);
    const retriever = new VectorStoreRetriever(store, { minScore: 0.5 });

    const results = await retriever.retrieve('query', [], 3);

    expect(results.map((r) => r.id)).toEqual(['docs/a.md#0', 'docs/c.md#0']);
  });

  it('should never return more than k chunks', async () => {
    const store = searcher([chunk('a#0', 0.9), chunk('b#0', 0.8), chunk('c#0', 0.7)]);
    const retriever = new VectorStoreRetriever(store);

    expect(await retriever.retrieve('query', [], 2)).toHaveLength(2);
  });

  it('should report store failures as retrieval failures', async () => {
    const store: ChunkSearcher = { searchByText: vi.fn<ChunkSearcher['searchByText']>().mockRejectedValue(new Error('table is locked')) };
    const retriever = new VectorStoreRetriever(store);

    const error = await retriever.retrieve('query', [], 2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalProviderError);
    if (error instanceof ExternalProviderError) {
      expect(error.stage).toBe('retrieval');
      expect(error.kind).toBe('unavailable');
      expect(error.message).toBe('Retrieval failed: table is locked');
    }
  });

  it('should keep the failure kind of an embedding error', async () => {
    const cause = new ExternalProviderError('embedding', 'rate_limit', 'Embedding failed: quota exceeded');
    const store: ChunkSearcher = { searchByText: vi.fn<ChunkSearcher['searchByText']>().mockRejectedValue(cause) };
    const retriever = new VectorStoreRetriever(store);

    const error = await retriever.retrieve('query', [], 2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalProviderError);
    if (error instanceof ExternalProviderError) {
      expect(error.stage).toBe('retrieval');
      expect(error.kind).toBe('rate_limit');
      expect(error.message).toBe('Retrieval failed: Embedding failed: quota exceeded');
      expect(error.cause).toBe(cause);
    }
  });
});
