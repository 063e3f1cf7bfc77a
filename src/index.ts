#!/usr/bin/env node

// MCP servers must only write JSON-RPC messages to stdout; all logging goes to stderr.

import { loadConfig } from './config.js';
import { createEmbeddings } from './embeddings/index.js';
import { AnswerAssembler } from './rag/answer-assembler.js';
import { createGenerator } from './rag/generator.js';
import { loadSynonyms } from './rag/query-normalizer.js';
import { VectorStoreRetriever } from './rag/retriever.js';
import { DocsAnswerServer } from './server.js';
import { ChunkStore } from './storage/chunk-store.js';
import { ingestSources } from './storage/source-loader.js';
import { logger } from './util/logger.js';

async function main() {
  const config = await loadConfig();

  const embeddings = createEmbeddings(config);
  const store = new ChunkStore(config.vectorDbPath, embeddings, {
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    maxCacheSize: config.searchCacheSize,
  });
  await store.initialize();

  if (config.documentationSources.length > 0) {
    const result = await ingestSources(store, config.documentationSources);
    logger.info(
      `Documentation sources: ${result.indexed.length} indexed, ${result.skipped.length} skipped, ${result.failed.length} failed`
    );
  }

  const synonyms = loadSynonyms();
  const retriever = new VectorStoreRetriever(store, { minScore: config.minRelevanceScore });
  const assembler = new AnswerAssembler({
    retriever,
    generator: createGenerator(config),
    config: {
      retrievalK: config.retrievalK,
      maxAnswerLength: config.maxAnswerLength,
      normalizer: config.normalizer,
      citation: config.citation,
      synonyms,
    },
  });

  const server = new DocsAnswerServer({ store, assembler, retriever, config, synonyms });
  await server.run();

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    server
      .close()
      .catch((error: unknown) => logger.error('Error while closing server:', error))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error('Server failed to start:', err);
  process.exit(1);
});
