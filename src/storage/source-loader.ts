import { readFile, readdir, stat } from 'fs/promises';
import { extname, isAbsolute, join, relative, resolve } from 'path';
import type { ChunkStore } from './chunk-store.js';
import { sourceIdFromUrl } from '../util/docs.js';
import { logger } from '../util/logger.js';

/** File types read from documentation directories */
export const SOURCE_EXTENSIONS = ['.md', '.markdown', '.txt'];

export type SourceIndexer = Pick<ChunkStore, 'addSource' | 'listSources'>;

export interface IngestResult {
  indexed: Array<{ source: string; chunks: number }>;
  skipped: string[];
  failed: Array<{ source: string; error: string }>;
}

export interface IngestOptions {
  /** Re-index files even when the stored copy is newer than the file */
  force?: boolean;
  /** Resolve relative sources against this directory (default: process.cwd()) */
  baseDir?: string;
}

function toPosix(path: string): string {
  return path.split('\\').join('/');
}

/** Relative to baseDir for files under it, absolute otherwise */
function fileId(baseDir: string, path: string): string {
  const rel = relative(baseDir, path);
  return toPosix(rel === '' || rel.startsWith('..') || isAbsolute(rel) ? path : rel);
}

/**
 * Expand a configured source into the documentation files it names. Relative sources
 * resolve against `baseDir`; absolute ones are taken as given. Directories are walked
 * recursively for {@link SOURCE_EXTENSIONS}. Ids of files under `baseDir` stay relative
 * to it so they match the ids eval sets refer to.
 */
export async function expandSource(source: string, baseDir: string): Promise<Array<{ id: string; path: string; mtime: Date }>> {
  const path = resolve(baseDir, source);
  const info = await stat(path);
  if (info.isFile()) {
    return [{ id: fileId(baseDir, path), path, mtime: info.mtime }];
  }

  const files: Array<{ id: string; path: string; mtime: Date }> = [];
  const pending = [path];
  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    for (const entry of await readdir(dir, { withFileTypes: true })) {
      const entryPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
      } else if (entry.isFile() && SOURCE_EXTENSIONS.includes(extname(entry.name).toLowerCase())) {
        files.push({ id: fileId(baseDir, entryPath), path: entryPath, mtime: (await stat(entryPath)).mtime });
      }
    }
  }
  return files.sort((a, b) => a.id.localeCompare(b.id));
}

/**
 * Index local documentation files. Remote URLs are not fetched; their content has to be
 * added through add_documentation. One bad source does not stop the others.
 */
export async function ingestSources(
  store: SourceIndexer,
  sources: readonly string[],
  options: IngestOptions = {}
): Promise<IngestResult> {
  const baseDir = options.baseDir ?? process.cwd();
  const result: IngestResult = { indexed: [], skipped: [], failed: [] };

  const stored = new Map((await store.listSources()).map((s) => [s.sourceId, s.lastUpdated]));

  for (const source of sources) {
    if (/^https?:\/\//i.test(source)) {
      logger.warn(`[SourceLoader] Skipping ${source}: remote sources must be added with add_documentation`);
      result.skipped.push(source);
      continue;
    }

    let files;
    try {
      files = await expandSource(source, baseDir);
    } catch (error) {
      logger.error(`[SourceLoader] Cannot read ${source}:`, error);
      result.failed.push({ source, error: error instanceof Error ? error.message : String(error) });
      continue;
    }

    for (const file of files) {
      const lastUpdated = stored.get(sourceIdFromUrl(file.id));
      if (!options.force && lastUpdated && new Date(lastUpdated) >= file.mtime) {
        logger.debug(`[SourceLoader] ${file.id} is up to date`);
        result.skipped.push(file.id);
        continue;
      }

      try {
        const content = await readFile(file.path, 'utf-8');
        const chunks = await store.addSource({ sourceUrl: file.id, content });
        logger.info(`[SourceLoader] Indexed ${file.id} (${chunks} chunks)`);
        result.indexed.push({ source: file.id, chunks });
      } catch (error) {
        logger.error(`[SourceLoader] Failed to index ${file.id}:`, error);
        result.failed.push({ source: file.id, error: error instanceof Error ? error.message : String(error) });
      }
    }
  }

  return result;
}
