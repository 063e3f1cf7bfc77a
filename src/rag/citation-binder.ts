import { UnsupportedClaimError } from '../errors.js';
import type {
  AnswerSegment,
  BoundSegment,
  Citation,
  RetrievedChunk,
  SegmentStatus,
  UnsupportedClaimPolicy,
} from '../types/rag.js';
import { contentWords, normalizeForMatch, tokenize } from '../util/text.js';

export const REDACTION_MARKER = '[unsupported claim removed]';

export interface BindOptions {
  policy?: UnsupportedClaimPolicy;
  /** Minimum overlap for a chunk to support a segment, in (0, 1] */
  overlapThreshold?: number;
  maxCitationsPerSegment?: number;
}

export interface BindingResult {
  segments: BoundSegment[];
  /** Rendered answer; citation spans index into this string */
  text: string;
  fullyCited: boolean;
  /** Indices of claim-bearing segments without support */
  unsupported: number[];
}

interface PreparedChunk {
  chunk: RetrievedChunk;
  order: number;
  normalized: string;
  tokens: ReadonlySet<string>;
}

// Inline markers such as [1] or [Source 2] that a model may add on its own
const INLINE_MARKER = /\[(?:source\s*|citation\s*)?\d+\]/gi;

function stripInlineMarkers(text: string): string {
  return text.replace(INLINE_MARKER, ' ');
}

function prepareChunks(chunks: readonly RetrievedChunk[]): PreparedChunk[] {
  const seen = new Set<string>();
  const prepared: PreparedChunk[] = [];
  for (const chunk of chunks) {
    if (seen.has(chunk.id)) {
      continue;
    }
    seen.add(chunk.id);
    prepared.push({
      chunk,
      order: prepared.length,
      normalized: ` ${normalizeForMatch(chunk.text)} `,
      tokens: new Set(tokenize(chunk.text)),
    });
  }
  return prepared;
}

function overlapWith(segmentNormalized: string, segmentWords: readonly string[], chunk: PreparedChunk): number {
  if (!segmentNormalized) {
    return 0;
  }
  if (chunk.normalized.includes(` ${segmentNormalized} `)) {
    return 1;
  }
  if (segmentWords.length === 0) {
    return 0;
  }
  const found = segmentWords.filter((word) => chunk.tokens.has(word)).length;
  return found / segmentWords.length;
}

/**
 * How well `chunkText` supports `segmentText`: 1 when the segment appears in the chunk
 * (ignoring case, punctuation and layout), otherwise the share of the segment's content
 * words that occur in the chunk.
 */
export function supportScore(segmentText: string, chunkText: string): number {
  const [prepared] = prepareChunks([{ id: 'chunk', text: chunkText, sourceUrl: '', score: 0 }]);
  const cleaned = stripInlineMarkers(segmentText);
  return overlapWith(normalizeForMatch(cleaned), contentWords(cleaned), prepared);
}

/**
 * Attach citations to every claim-bearing segment and apply the unsupported-claim policy.
 *
 * Citations only ever point at `retrievedChunks`. Under `reject`, any unsupported claim
 * throws {@link UnsupportedClaimError} and nothing is returned.
 */
export function bind(
  answerSegments: readonly AnswerSegment[],
  retrievedChunks: readonly RetrievedChunk[],
  options: BindOptions = {}
): BindingResult {
  const policy = options.policy ?? 'flag';
  const threshold = options.overlapThreshold ?? 0.5;
  const maxCitations = options.maxCitationsPerSegment ?? 3;

  if (!(threshold > 0 && threshold <= 1)) {
    throw new RangeError(`overlapThreshold must be in (0, 1], got ${threshold}`);
  }
  if (!Number.isInteger(maxCitations) || maxCitations < 1) {
    throw new RangeError(`maxCitationsPerSegment must be a positive integer, got ${maxCitations}`);
  }

  const chunks = prepareChunks(retrievedChunks);
  const segments: BoundSegment[] = [];
  const unsupported: number[] = [];
  let offset = 0;

  for (const [index, segment] of answerSegments.entries()) {
    let text = segment.text;
    let status: SegmentStatus = 'non_claim';
    let supporting: Array<{ prepared: PreparedChunk; overlap: number }> = [];

    if (segment.isClaim) {
      const cleaned = stripInlineMarkers(segment.text);
      const normalized = normalizeForMatch(cleaned);
      const words = contentWords(cleaned);

      supporting = chunks
        .map((prepared) => ({ prepared, overlap: overlapWith(normalized, words, prepared) }))
        .filter((candidate) => candidate.overlap >= threshold)
        .sort((a, b) => b.overlap - a.overlap || a.prepared.order - b.prepared.order)
        .slice(0, maxCitations);

      if (supporting.length > 0) {
        status = 'cited';
      } else {
        unsupported.push(index);
        if (policy === 'redact') {
          text = REDACTION_MARKER;
          status = 'redacted';
        } else {
          status = 'unverified';
        }
      }
    }

    const span = { start: offset, end: offset + text.length };
    const citations: Citation[] = supporting.map(({ prepared, overlap }) => ({
      chunkId: prepared.chunk.id,
      sourceUrl: prepared.chunk.sourceUrl,
      ...(prepared.chunk.title ? { title: prepared.chunk.title } : {}),
      span: { ...span },
      overlap,
    }));

    segments.push({ text, isClaim: segment.isClaim, trailing: segment.trailing, citations, status });
    offset += text.length + segment.trailing.length;
  }

  if (policy === 'reject' && unsupported.length > 0) {
    throw new UnsupportedClaimError(unsupported.map((index) => answerSegments[index].text));
  }

  return {
    segments,
    text: segments.map((segment) => segment.text + segment.trailing).join(''),
    fullyCited: unsupported.length === 0,
    unsupported,
  };
}
