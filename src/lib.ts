export * from './types/rag.js';
export * from './errors.js';
export {
  loadConfig,
  parseConfig,
  freezeConfig,
  parseSourceList,
  DEFAULT_DATA_DIR,
  type AppConfig,
  type ModelProvider,
  type EmbeddingsProviderName,
  type NormalizerSettings,
  type CitationSettings,
} from './config.js';
export { normalizeQuery, loadSynonyms, type NormalizeOptions, type SynonymTable } from './rag/query-normalizer.js';
export { segmentAnswer, renderSegments, isClaim } from './rag/segmenter.js';
export { bind, supportScore, REDACTION_MARKER, type BindOptions, type BindingResult } from './rag/citation-binder.js';
export { AnswerAssembler, EMPTY_RETRIEVAL_MESSAGE, type AssemblerConfig, type AnswerOptions } from './rag/answer-assembler.js';
export { VectorStoreRetriever, type ChunkSearcher, type RetrievalOptions } from './rag/retriever.js';
export {
  OpenAIChatGenerator,
  ExtractiveGenerator,
  NO_ANSWER_TEXT,
  createGenerator,
  getProviderInfo,
  type ProviderInfo,
  type ProviderStatus,
} from './rag/generator.js';
export { buildPrompt, formatSources, SYSTEM_PROMPT } from './rag/prompt.js';
export { ChunkStore, type SourceInput, type SourceSummary, type ChunkStoreInfo, type ChunkStoreOptions } from './storage/chunk-store.js';
export { ingestSources, expandSource, type IngestResult, type IngestOptions } from './storage/source-loader.js';
export { createEmbeddings, OpenAIEmbeddings, HashingEmbeddings, type EmbeddingsProvider } from './embeddings/index.js';
export {
  precisionAtK,
  recallAtK,
  parseEvalSet,
  loadEvalSet,
  evaluateRetrieval,
  citationCoverage,
  type EvalRecord,
  type RetrievalReport,
  type QueryEvaluation,
} from './eval/metrics.js';
export { DocsAnswerServer, TOOL_DEFINITIONS, type DocsStore, type DocsAnswerServerDeps } from './server.js';
