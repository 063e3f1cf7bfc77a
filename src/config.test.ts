import { tmpdir } from 'os';
import { join } from 'path';
import { mkdtemp, rm, stat } from 'node:fs/promises';
import { parseConfig, parseSourceList, loadConfig, DEFAULT_DATA_DIR } from './config.js';
import { ConfigError } from './errors.js';

describe('Configuration', () => {
  describe('parseConfig', () => {
    it('should apply defaults for an empty environment', () => {
      const config = parseConfig({});

      expect(config.modelProvider).toBe('openai');
      expect(config.modelName).toBe('gpt-4o-mini');
      expect(config.grokModel).toBe('grok-beta');
      expect(config.grokApiUrl).toBe('https://api.x.ai/v1');
      expect(config.temperature).toBe(0.7);
      expect(config.maxTokens).toBe(1000);
      expect(config.maxRetries).toBe(2);
      expect(config.embeddingsProvider).toBe('hashing');
      expect(config.dataDir).toBe(DEFAULT_DATA_DIR);
      expect(config.vectorDbPath).toBe(join(DEFAULT_DATA_DIR, 'vectors'));
      expect(config.chunkSize).toBe(1000);
      expect(config.chunkOverlap).toBe(200);
      expect(config.retrievalK).toBe(4);
      expect(config.minRelevanceScore).toBe(0);
      expect(config.maxAnswerLength).toBe(2000);
      expect(config.searchCacheSize).toBe(1000);
      expect(config.normalizer).toEqual({ caseFold: true, stripPunctuation: true, synonymExpand: true });
      expect(config.citation).toEqual({ policy: 'flag', overlapThreshold: 0.5, maxCitationsPerSegment: 3 });
      expect(config.documentationSources).toEqual([]);
    });

    it('should default to openai embeddings when an API key is present', () => {
      const config = parseConfig({ OPENAI_API_KEY: 'test-secret' });
      expect(config.openaiApiKey).toBe('test-secret');
      expect(config.embeddingsProvider).toBe('openai');
    });

    it('should treat blank API keys as missing', () => {
      const config = parseConfig({ OPENAI_API_KEY: '   ' });
      expect(config.openaiApiKey).toBeUndefined();
      expect(config.embeddingsProvider).toBe('hashing');
    });

    it('should coerce numeric and boolean variables', () => {
      const config = parseConfig({
        TEMPERATURE: '0.2',
        RETRIEVAL_K: '8',
        CITATION_OVERLAP_THRESHOLD: '0.75',
        QUERY_CASE_FOLD: 'false',
        QUERY_SYNONYM_EXPAND: '0',
        UNSUPPORTED_CLAIM_POLICY: 'redact',
      });

      expect(config.temperature).toBe(0.2);
      expect(config.retrievalK).toBe(8);
      expect(config.citation.overlapThreshold).toBe(0.75);
      expect(config.citation.policy).toBe('redact');
      expect(config.normalizer).toEqual({ caseFold: false, stripPunctuation: true, synonymExpand: false });
    });

    it('should reject an unknown policy', () => {
      expect(() => parseConfig({ UNSUPPORTED_CLAIM_POLICY: 'ignore' })).toThrow(ConfigError);
    });

    it('should name every offending variable', () => {
      try {
        parseConfig({ RETRIEVAL_K: '0', MODEL_PROVIDER: 'other' });
        expect.fail('expected ConfigError');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigError);
        if (error instanceof ConfigError) {
          expect(error.issues.some((issue) => issue.startsWith('RETRIEVAL_K:'))).toBe(true);
          expect(error.issues.some((issue) => issue.startsWith('MODEL_PROVIDER:'))).toBe(true);
          expect(error.message.startsWith('Invalid configuration: ')).toBe(true);
        }
      }
    });

    it('should reject an overlap that is not smaller than the chunk size', () => {
      expect(() => parseConfig({ CHUNK_SIZE: '500', CHUNK_OVERLAP: '500' })).toThrow(
        'CHUNK_OVERLAP: must be smaller than CHUNK_SIZE'
      );
    });

    it('should report malformed DOCUMENTATION_SOURCES JSON', () => {
      expect(() => parseConfig({ DOCUMENTATION_SOURCES: '["a.md",' })).toThrow(ConfigError);
    });
  });

  describe('parseSourceList', () => {
    it('should return an empty list for missing input', () => {
      expect(parseSourceList(undefined)).toEqual([]);
      expect(parseSourceList('  ')).toEqual([]);
    });

    it('should split comma-separated lists', () => {
      expect(parseSourceList('docs/a.md, docs/b.md,,')).toEqual(['docs/a.md', 'docs/b.md']);
    });

    it('should parse JSON arrays', () => {
      expect(parseSourceList('["https://example.com/docs", " docs/c.md "]')).toEqual([
        'https://example.com/docs',
        'docs/c.md',
      ]);
    });

    it('should reject malformed and non-string JSON arrays', () => {
      expect(() => parseSourceList('["a.md",')).toThrow(/^Invalid JSON: /);
      expect(() => parseSourceList('["a.md", 2]')).toThrow(/^Schema validation failed: /);
    });
  });

  describe('loadConfig', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'cited-docs-config-'));
    });

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    it('should create the vector directory and freeze the result', async () => {
      const dataDir = join(tempDir, 'data');
      const config = await loadConfig({ DATA_DIR: dataDir, MODEL_PROVIDER: 'demo' });

      const info = await stat(join(dataDir, 'vectors'));
      expect(info.isDirectory()).toBe(true);
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.citation)).toBe(true);
      expect(Object.isFrozen(config.normalizer)).toBe(true);
    });

    it('should require an API key for openai embeddings', async () => {
      await expect(
        loadConfig({ DATA_DIR: tempDir, EMBEDDINGS_PROVIDER: 'openai' })
      ).rejects.toThrow('EMBEDDINGS_PROVIDER: openai embeddings require OPENAI_API_KEY');
    });
  });
});
