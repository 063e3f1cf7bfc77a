import { chunkText, cleanText, contentWords, normalizeForMatch, tokenize } from './text.js';

describe('Text Utilities', () => {
  describe('cleanText', () => {
    it('should collapse whitespace', () => {
      expect(cleanText('  Hello,\n\n  world!\t ')).toBe('Hello, world!');
    });

    it('should keep unicode letters and drop symbols', () => {
      expect(cleanText('Café → naïve • “quotes”')).toBe('Café  naïve  quotes');
    });

    it('should keep code punctuation', () => {
      expect(cleanText('Chroma(persist_directory="./db")')).toBe('Chroma(persist_directory="./db")');
    });
  });

  describe('chunkText', () => {
    it('should return short text as a single chunk', () => {
      expect(chunkText('short text', 100, 10)).toEqual(['short text']);
    });

    it('should overlap fixed-size windows', () => {
      expect(chunkText('abcdefghijklmnopqrstuvwxyz', 10, 2)).toEqual(['abcdefghij', 'ijklmnopqr', 'qrstuvwxyz']);
    });

    it('should prefer to end chunks on sentence terminators', () => {
      expect(chunkText('One two three. Four five six seven eight.', 20, 0)).toEqual([
        'One two three.',
        'Four five six seven',
        'eight.',
      ]);
    });

    it('should reject invalid sizes', () => {
      expect(() => chunkText('text', 0, 0)).toThrow('chunkSize must be positive');
      expect(() => chunkText('text', 10, 10)).toThrow('overlap must be between 0 and chunkSize - 1');
    });
  });

  describe('tokenize', () => {
    it('should lowercase runs of letters and digits', () => {
      expect(tokenize('Chroma’s API v2, déjà-vu!')).toEqual(['chroma', 's', 'api', 'v2', 'déjà', 'vu']);
    });

    it('should return an empty list for punctuation only', () => {
      expect(tokenize('...!?')).toEqual([]);
    });
  });

  describe('contentWords', () => {
    it('should drop stop words and duplicates', () => {
      expect(contentWords('The Chroma store and the chroma index')).toEqual(['chroma', 'store', 'index']);
    });

    it('should drop contraction stems', () => {
      expect(contentWords("Don't delete the collection")).toEqual(['delete', 'collection']);
    });
  });

  describe('normalizeForMatch', () => {
    it('should ignore case, punctuation and layout', () => {
      expect(normalizeForMatch('Data is written\nto DISK, automatically!')).toBe('data is written to disk automatically');
    });
  });
});
