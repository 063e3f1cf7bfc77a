import type { CitationSettings, NormalizerSettings } from '../config.js';
import { UnsupportedClaimError, toProviderError } from '../errors.js';
import type { AnswerOutcome, Generator, Query, RetrievedChunk, Retriever } from '../types/rag.js';
import { createLogger } from '../util/logger.js';
import { DEFAULT_DENYLIST, detectPromptInjection, isInputAllowed, truncateOutput } from '../util/security.js';
import { bind } from './citation-binder.js';
import { buildPrompt } from './prompt.js';
import { normalizeQuery, type SynonymTable } from './query-normalizer.js';
import { segmentAnswer } from './segmenter.js';

const log = createLogger('AnswerAssembler');

export const EMPTY_RETRIEVAL_MESSAGE =
  'No sources found in the indexed documentation for this question, so no answer was generated.';

export interface AssemblerConfig {
  retrievalK: number;
  maxAnswerLength: number;
  normalizer: NormalizerSettings;
  citation: CitationSettings;
  denylist?: readonly string[];
  synonyms?: SynonymTable;
}

export interface AnswerAssemblerDeps {
  retriever: Retriever;
  generator: Generator;
  config: AssemblerConfig;
}

export interface AnswerOptions {
  k?: number;
}

/**
 * Runs one question through normalize → retrieve → generate → segment → bind.
 *
 * Holds no per-request state, so a single instance can serve concurrent requests.
 * Retrieval and generation failures surface as {@link ExternalProviderError}; every other
 * result is an {@link AnswerOutcome}.
 */
export class AnswerAssembler {
  private readonly retriever: Retriever;
  private readonly generator: Generator;
  private readonly config: Readonly<AssemblerConfig>;

  constructor({ retriever, generator, config }: AnswerAssemblerDeps) {
    this.retriever = retriever;
    this.generator = generator;
    this.config = Object.freeze({
      ...config,
      normalizer: Object.freeze({ ...config.normalizer }),
      citation: Object.freeze({ ...config.citation }),
    });
  }

  get providerName(): string {
    return this.generator.name;
  }

  private screen(raw: string): string[] {
    const reasons: string[] = [];

    const denied = isInputAllowed(raw, this.config.denylist ?? DEFAULT_DENYLIST);
    for (const term of denied.matches) {
      reasons.push(`Query contains blocked term: "${term}"`);
    }

    const injection = detectPromptInjection(raw);
    if (injection.maxSeverity === 'high') {
      for (const detection of injection.detections.filter((d) => d.severity === 'high')) {
        reasons.push(`Possible prompt injection: ${detection.description}`);
      }
    }

    return reasons;
  }

  async answer(rawQuery: string, options: AnswerOptions = {}): Promise<AnswerOutcome> {
    const query: Query = normalizeQuery(rawQuery, this.config.normalizer, this.config.synonyms);

    const reasons = this.screen(rawQuery);
    if (reasons.length > 0) {
      log.warn('Blocked query:', reasons);
      return { status: 'blocked', query, reasons };
    }

    const k = options.k ?? this.config.retrievalK;
    let chunks: RetrievedChunk[];
    try {
      chunks = (await this.retriever.retrieve(query.normalized, query.expansions, k)).slice(0, k);
    } catch (error) {
      throw toProviderError('retrieval', error);
    }

    if (chunks.length === 0) {
      log.info(`No chunks retrieved for "${query.normalized}"`);
      return { status: 'empty_retrieval', query, message: EMPTY_RETRIEVAL_MESSAGE };
    }

    let generated: string;
    try {
      generated = await this.generator.generate(buildPrompt(query, chunks), chunks);
    } catch (error) {
      throw toProviderError('generation', error);
    }

    const text = truncateOutput(generated, this.config.maxAnswerLength);
    const { policy, overlapThreshold, maxCitationsPerSegment } = this.config.citation;

    try {
      const binding = bind(segmentAnswer(text), chunks, { policy, overlapThreshold, maxCitationsPerSegment });
      log.debug(`Bound ${binding.segments.length} segments, ${binding.unsupported.length} unsupported`);
      return {
        status: 'answered',
        answer: {
          query,
          text: binding.text,
          segments: binding.segments,
          sources: chunks,
          fullyCited: binding.fullyCited,
          policy,
          provider: this.generator.name,
        },
      };
    } catch (error) {
      if (error instanceof UnsupportedClaimError) {
        log.info(`Rejected answer with ${error.unsupportedSegments.length} unsupported claim(s)`);
        return { status: 'unsupported_claim', query, unsupportedSegments: error.unsupportedSegments };
      }
      throw error;
    }
  }
}
