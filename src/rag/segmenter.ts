import type { AnswerSegment } from '../types/rag.js';
import { contentWords, normalizeForMatch } from '../util/text.js';

export interface SegmentOptions {
  /** Segments with fewer content words than this are not treated as claims */
  minClaimTokens?: number;
}

const CODE_FENCE = /```[\s\S]*?(?:```|$)/g;

// Whitespace after sentence-final punctuation, or any whitespace run containing a line break
const BOUNDARY = /(?<=[.!?]["')\]]*)\s+|[^\S\n]*\n\s*/g;

/**
 * Openers of conversational or hedging sentences, compared on normalized text.
 */
const NON_CLAIM_OPENERS = [
  'i m not sure',
  'i am not sure',
  'i don t know',
  'i do not know',
  'i couldn t find',
  'i could not find',
  'sorry',
  'unfortunately i',
  'hello',
  'hi',
  'hey',
  'thanks',
  'thank you',
  'let me know',
  'i hope this helps',
  'hope this helps',
  'feel free',
].map(normalizeForMatch);

function isNonClaimOpener(text: string): boolean {
  const normalized = normalizeForMatch(text);
  return NON_CLAIM_OPENERS.some((opener) => normalized === opener || normalized.startsWith(`${opener} `));
}

/**
 * Whether a single sentence or block asserts something that needs a source.
 */
export function isClaim(text: string, minClaimTokens = 3): boolean {
  const trimmed = text.trim();
  if (!trimmed || trimmed.startsWith('```')) {
    return false;
  }
  if (/\?["')\]]*$/.test(trimmed)) {
    return false;
  }
  if (isNonClaimOpener(trimmed)) {
    return false;
  }
  return contentWords(trimmed).length >= minClaimTokens;
}

function pushSegment(segments: AnswerSegment[], rawText: string, trailing: string, claim: (text: string) => boolean): void {
  const previous = segments[segments.length - 1];
  const body = rawText.trimStart();
  const leading = rawText.slice(0, rawText.length - body.length);
  const text = body.trimEnd();
  const spill = body.slice(text.length) + trailing;

  // Whitespace belongs to whatever came before it
  if (previous) {
    previous.trailing += leading;
  }
  if (!text) {
    if (previous) {
      previous.trailing += spill;
    }
    return;
  }
  segments.push({ text, isClaim: claim(text), trailing: spill });
}

function splitProse(prose: string, segments: AnswerSegment[], claim: (text: string) => boolean): void {
  let last = 0;
  for (const match of prose.matchAll(BOUNDARY)) {
    const index = match.index ?? 0;
    pushSegment(segments, prose.slice(last, index), match[0], claim);
    last = index + match[0].length;
  }
  pushSegment(segments, prose.slice(last), '', claim);
}

/**
 * Split generated text into sentence-level segments.
 *
 * Sentences end at `.`, `!` or `?` followed by whitespace, and at line breaks. Fenced code
 * blocks stay whole and never count as claims. Joining `text + trailing` over the result
 * gives back the input without its leading whitespace.
 */
export function segmentAnswer(text: string, options: SegmentOptions = {}): AnswerSegment[] {
  const minClaimTokens = options.minClaimTokens ?? 3;
  const claim = (segment: string): boolean => isClaim(segment, minClaimTokens);

  const input = text.trimStart();
  const segments: AnswerSegment[] = [];

  let last = 0;
  for (const match of input.matchAll(CODE_FENCE)) {
    const index = match.index ?? 0;
    splitProse(input.slice(last, index), segments, claim);
    segments.push({ text: match[0], isClaim: false, trailing: '' });
    last = index + match[0].length;
  }
  splitProse(input.slice(last), segments, claim);

  return segments;
}

/**
 * Text as the reader sees it: every segment followed by its trailing whitespace.
 */
export function renderSegments(segments: readonly AnswerSegment[]): string {
  return segments.map((segment) => segment.text + segment.trailing).join('');
}
