export type UnsupportedClaimPolicy = 'flag' | 'redact' | 'reject';

export interface Query {
  readonly raw: string;
  readonly normalized: string;
  readonly expansions: readonly string[];
}

/**
 * A chunk returned by the retriever. Owned by the retriever; downstream code only reads it.
 */
export interface RetrievedChunk {
  readonly id: string;
  readonly text: string;
  readonly sourceUrl: string;
  readonly score: number;
  readonly title?: string;
  readonly section?: string;
}

export interface AnswerSegment {
  text: string;
  /** Whether the segment asserts something that needs a source */
  isClaim: boolean;
  /** Whitespace that followed the segment in the generated text */
  trailing: string;
}

export interface CharSpan {
  start: number;
  end: number;
}

export interface Citation {
  chunkId: string;
  sourceUrl: string;
  title?: string;
  /** Range of the rendered answer text this citation supports */
  span: CharSpan;
  /** 1 for containment, otherwise the share of the segment's content words found in the chunk */
  overlap: number;
}

export type SegmentStatus = 'cited' | 'unverified' | 'redacted' | 'non_claim';

export interface BoundSegment extends AnswerSegment {
  citations: Citation[];
  status: SegmentStatus;
}

export interface Answer {
  query: Query;
  text: string;
  segments: BoundSegment[];
  sources: RetrievedChunk[];
  fullyCited: boolean;
  policy: UnsupportedClaimPolicy;
  provider: string;
}

export type AnswerOutcome =
  | { status: 'answered'; answer: Answer }
  | { status: 'empty_retrieval'; query: Query; message: string }
  | { status: 'unsupported_claim'; query: Query; unsupportedSegments: string[] }
  | { status: 'blocked'; query: Query; reasons: string[] };

export interface Retriever {
  retrieve(normalizedQuery: string, expansionTerms: readonly string[], k: number): Promise<RetrievedChunk[]>;
}

export interface Generator {
  readonly name: string;
  generate(prompt: string, retrievedChunks: readonly RetrievedChunk[]): Promise<string>;
}
