import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const STOPWORDS_PATH = fileURLToPath(new URL('../../data/stopwords.json', import.meta.url));

let stopwords: ReadonlySet<string> | null = null;

function loadStopwords(): ReadonlySet<string> {
  if (!stopwords) {
    const parsed = z.array(z.string()).parse(JSON.parse(readFileSync(STOPWORDS_PATH, 'utf-8')));
    stopwords = new Set(parsed);
  }
  return stopwords;
}

/**
 * Collapse whitespace and drop characters other than letters, digits, whitespace
 * and basic punctuation.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/[^\p{L}\p{N}_\s.,!?;:'"\-()[\]{}/=]/gu, '')
    .trim();
}

/**
 * Split text into overlapping chunks of at most `chunkSize` characters.
 * A chunk prefers to end on a sentence terminator found in the last 100 characters
 * of its window (but not in its first half).
 */
export function chunkText(text: string, chunkSize = 1000, overlap = 200): string[] {
  if (chunkSize <= 0) {
    throw new Error('chunkSize must be positive');
  }
  if (overlap < 0 || overlap >= chunkSize) {
    throw new Error('overlap must be between 0 and chunkSize - 1');
  }
  if (text.length <= chunkSize) {
    return [text];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + chunkSize;

    if (end < text.length) {
      const floor = Math.max(start + Math.floor(chunkSize / 2), end - 100);
      for (let i = end; i > floor; i--) {
        if ('.!?'.includes(text[i])) {
          end = i + 1;
          break;
        }
      }
    }

    const chunk = text.slice(start, end).trim();
    if (chunk) {
      chunks.push(chunk);
    }

    if (end >= text.length) {
      break;
    }
    start = Math.max(end - overlap, start + 1);
  }

  return chunks;
}

/**
 * Lowercased runs of letters and digits.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Distinct tokens of two or more characters that are not stop words, in first-seen order.
 */
export function contentWords(text: string): string[] {
  const stop = loadStopwords();
  const seen = new Set<string>();
  for (const token of tokenize(text)) {
    if (token.length >= 2 && !stop.has(token)) {
      seen.add(token);
    }
  }
  return Array.from(seen);
}

/**
 * Tokens joined by single spaces; used for containment checks that ignore case,
 * punctuation and layout.
 */
export function normalizeForMatch(text: string): string {
  return tokenize(text).join(' ');
}
