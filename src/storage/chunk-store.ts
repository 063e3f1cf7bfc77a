import * as lancedb from '@lancedb/lancedb';
import { DataType, Field, FixedSizeList, Float32, Schema, Utf8 } from 'apache-arrow';
import QuickLRU from 'quick-lru';
import { mkdir } from 'fs/promises';
import { z } from 'zod';
import type { EmbeddingsProvider } from '../embeddings/types.js';
import type { RetrievedChunk } from '../types/rag.js';
import { chunkId, sourceIdFromUrl, titleFromSource } from '../util/docs.js';
import { escapeFilterValue } from '../util/security.js';
import { chunkText, cleanText } from '../util/text.js';
import { logger } from '../util/logger.js';

type LanceDBConnection = Awaited<ReturnType<typeof lancedb.connect>>;
type LanceDBTable = Awaited<ReturnType<LanceDBConnection['openTable']>>;

const TABLE_NAME = 'chunks';

type ChunkRow = {
  id: string;
  /** Source id; replace and delete filter on it */
  source: string;
  /** Source as it was added, shown to readers */
  url: string;
  title: string;
  section: string;
  content: string;
  vector: number[];
  updated: string;
};

const SearchRowSchema = z.object({
  id: z.string(),
  url: z.string(),
  title: z.string().nullish(),
  section: z.string().nullish(),
  content: z.string(),
  _distance: z.number(),
});

const SourceRowSchema = z.object({
  source: z.string(),
  url: z.string(),
  title: z.string().nullish(),
  updated: z.string(),
});

export interface SourceInput {
  sourceUrl: string;
  content: string;
  title?: string;
  section?: string;
}

export interface SourceSummary {
  sourceId: string;
  sourceUrl: string;
  title: string;
  chunks: number;
  lastUpdated: string;
}

export interface ChunkStoreInfo {
  vectorDbPath: string;
  table: string;
  embeddings: string;
  dimensions: number;
  chunks: number;
  sources: number;
}

export interface ChunkStoreOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  maxCacheSize?: number;
}

/**
 * Chunked documentation in a LanceDB table, searched by cosine similarity.
 *
 * Each source is cleaned, split into overlapping chunks and embedded on write. Writing a
 * source replaces whatever was stored for it before. Search results are cached until the
 * next write.
 */
export class ChunkStore {
  private lanceConn?: LanceDBConnection;
  private lanceTable?: LanceDBTable;
  private readonly searchCache: QuickLRU<string, RetrievedChunk[]>;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  constructor(
    private readonly vectorDbPath: string,
    private readonly embeddings: EmbeddingsProvider,
    options: ChunkStoreOptions = {}
  ) {
    this.chunkSize = options.chunkSize ?? 1000;
    this.chunkOverlap = options.chunkOverlap ?? 200;
    const maxCacheSize = options.maxCacheSize ?? 1000;
    logger.debug(`[ChunkStore] Initializing with path:`, { vectorDbPath, maxCacheSize });
    this.searchCache = new QuickLRU({ maxSize: maxCacheSize });
  }

  async initialize(): Promise<void> {
    try {
      await mkdir(this.vectorDbPath, { recursive: true });
    } catch (error) {
      logger.error('[ChunkStore] Error creating directory:', error);
      throw new Error(`Failed to create storage directory: ${error instanceof Error ? error.message : String(error)}`);
    }

    try {
      logger.debug(`[ChunkStore] Connecting to LanceDB at ${this.vectorDbPath}`);
      this.lanceConn = await lancedb.connect(this.vectorDbPath);

      const tableNames = await this.lanceConn.tableNames();
      if (!tableNames.includes(TABLE_NAME)) {
        logger.debug(`[ChunkStore] Creating ${TABLE_NAME} table with dimensions: ${this.embeddings.dimensions}`);

        const vectorType = new FixedSizeList(this.embeddings.dimensions, new Field('item', new Float32(), true));

        const schema = new Schema([
          new Field('id', new Utf8(), false),
          new Field('source', new Utf8(), false),
          new Field('url', new Utf8(), false),
          new Field('title', new Utf8(), true),
          new Field('section', new Utf8(), true),
          new Field('content', new Utf8(), false),
          new Field('vector', vectorType, false),
          new Field('updated', new Utf8(), false),
        ]);

        this.lanceTable = await this.lanceConn.createEmptyTable(TABLE_NAME, schema, { mode: 'create' });
      } else {
        logger.debug(`[ChunkStore] Using existing ${TABLE_NAME} table`);
        this.lanceTable = await this.lanceConn.openTable(TABLE_NAME);
        await this.assertCompatible(this.lanceTable);
      }

      const rowCount = await this.lanceTable.countRows();
      logger.debug(`[ChunkStore] ${TABLE_NAME} table initialized, contains ${rowCount} rows`);
    } catch (error) {
      logger.error('[ChunkStore] Error initializing LanceDB:', error);
      throw new Error(`Failed to initialize LanceDB: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * A table built with another embeddings provider cannot be searched with this one.
   */
  private async assertCompatible(table: LanceDBTable): Promise<void> {
    const schema = await table.schema();
    if (!schema.fields.some((field) => field.name === 'url')) {
      throw new Error(`${TABLE_NAME} table has no url column; remove ${this.vectorDbPath} and re-index`);
    }
    const vectorField = schema.fields.find((field) => field.name === 'vector');
    if (vectorField && DataType.isFixedSizeList(vectorField.type) && vectorField.type.listSize !== this.embeddings.dimensions) {
      throw new Error(
        `stored vectors have ${vectorField.type.listSize} dimensions but ${this.embeddings.name} produces ${this.embeddings.dimensions}`
      );
    }
  }

  private requireTable(): LanceDBTable {
    if (!this.lanceTable) {
      throw new Error('Storage not initialized');
    }
    return this.lanceTable;
  }

  /**
   * Chunk, embed and store a source, replacing the chunks of every source with the same
   * {@link sourceIdFromUrl | source id} (`./docs/a.md` replaces `docs/a.md`).
   * @returns the number of chunks written
   */
  async addSource(input: SourceInput): Promise<number> {
    const table = this.requireTable();
    const sourceUrl = input.sourceUrl.trim();
    const sourceId = sourceIdFromUrl(sourceUrl);
    const title = input.title?.trim() || titleFromSource(sourceUrl);

    const pieces = chunkText(cleanText(input.content), this.chunkSize, this.chunkOverlap).filter(Boolean);
    logger.debug(`[ChunkStore] Adding source:`, { sourceUrl, title, chunks: pieces.length });

    const updated = new Date().toISOString();
    const rows: ChunkRow[] = [];
    for (const [index, content] of pieces.entries()) {
      rows.push({
        id: chunkId(sourceId, index),
        source: sourceId,
        url: sourceUrl,
        title,
        section: input.section ?? '',
        content,
        vector: await this.embeddings.embed(content),
        updated,
      });
    }

    try {
      await table.delete(`source = '${escapeFilterValue(sourceId)}'`);
      if (rows.length > 0) {
        await table.add(rows);
      }
    } catch (error) {
      logger.error('[ChunkStore] Error adding source:', error);
      throw error;
    } finally {
      this.searchCache.clear();
    }

    return rows.length;
  }

  async searchByText(query: string, limit = 10): Promise<RetrievedChunk[]> {
    const table = this.requireTable();
    const text = query.trim();
    if (!text) {
      return [];
    }

    const cacheKey = `${limit}:${text}`;
    const cached = this.searchCache.get(cacheKey);
    if (cached) {
      logger.debug(`[ChunkStore] Returning cached results`);
      return cached;
    }

    const queryVector = await this.embeddings.embed(text);
    const rawResults: unknown[] = await table.vectorSearch(queryVector).distanceType('cosine').limit(limit).toArray();
    logger.debug(`[ChunkStore] Found ${rawResults.length} results`);

    const results = rawResults.map((raw): RetrievedChunk => {
      const row = SearchRowSchema.parse(raw);
      return {
        id: row.id,
        text: row.content,
        sourceUrl: row.url,
        score: 1 - row._distance,
        ...(row.title ? { title: row.title } : {}),
        ...(row.section ? { section: row.section } : {}),
      };
    });

    this.searchCache.set(cacheKey, results);
    return results;
  }

  async listSources(): Promise<SourceSummary[]> {
    const table = this.requireTable();
    const rawRows: unknown[] = await table.query().select(['source', 'url', 'title', 'updated']).toArray();

    const sources = new Map<string, SourceSummary>();
    for (const raw of rawRows) {
      const row = SourceRowSchema.parse(raw);
      const existing = sources.get(row.source);
      if (existing) {
        existing.chunks += 1;
      } else {
        sources.set(row.source, {
          sourceId: row.source,
          sourceUrl: row.url,
          title: row.title || titleFromSource(row.url),
          chunks: 1,
          lastUpdated: row.updated,
        });
      }
    }

    return Array.from(sources.values()).sort((a, b) => b.lastUpdated.localeCompare(a.lastUpdated) || a.sourceUrl.localeCompare(b.sourceUrl));
  }

  /**
   * Removes the chunks stored under the source id of `sourceUrl`.
   * @returns the number of chunks removed; 0 when the source was not indexed
   */
  async deleteSource(sourceUrl: string): Promise<number> {
    const table = this.requireTable();
    const filter = `source = '${escapeFilterValue(sourceIdFromUrl(sourceUrl))}'`;

    const existing = await table.countRows(filter);
    if (existing === 0) {
      return 0;
    }

    logger.debug(`[ChunkStore] Deleting ${existing} chunks for ${sourceUrl}`);
    try {
      await table.delete(filter);
    } finally {
      this.searchCache.clear();
    }
    return existing;
  }

  async countChunks(): Promise<number> {
    return this.requireTable().countRows();
  }

  async getInfo(): Promise<ChunkStoreInfo> {
    const sources = await this.listSources();
    return {
      vectorDbPath: this.vectorDbPath,
      table: TABLE_NAME,
      embeddings: this.embeddings.name,
      dimensions: this.embeddings.dimensions,
      chunks: await this.countChunks(),
      sources: sources.length,
    };
  }
}
