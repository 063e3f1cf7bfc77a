import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Query } from '../types/rag.js';

export interface NormalizeOptions {
  caseFold?: boolean;
  stripPunctuation?: boolean;
  synonymExpand?: boolean;
}

/** Term (lowercase, one or more words) → aliases, in priority order */
export type SynonymTable = ReadonlyMap<string, readonly string[]>;

const SYNONYMS_PATH = fileURLToPath(new URL('../../data/synonyms.json', import.meta.url));

const SynonymFileSchema = z.record(z.array(z.string().min(1)));

let defaultSynonyms: SynonymTable | null = null;

/**
 * Read a synonym table from JSON. Without a path, the bundled table is loaded once and reused.
 */
export function loadSynonyms(path?: string): SynonymTable {
  if (!path && defaultSynonyms) {
    return defaultSynonyms;
  }

  const parsed = SynonymFileSchema.parse(JSON.parse(readFileSync(path ?? SYNONYMS_PATH, 'utf-8')));
  const table = new Map<string, readonly string[]>();
  for (const [term, aliases] of Object.entries(parsed)) {
    table.set(term.trim().toLowerCase(), Object.freeze(aliases.map((alias) => alias.trim()).filter(Boolean)));
  }

  if (!path) {
    defaultSynonyms = table;
  }
  return table;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive occurrence of `term` in `text`.
 */
function containsTerm(text: string, term: string): boolean {
  const words = term.trim().split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`(?:^|[^\\p{L}\\p{N}])${words}(?:$|[^\\p{L}\\p{N}])`, 'iu').test(text);
}

/**
 * Canonicalize a raw query and collect synonym expansions for retrieval.
 *
 * Whitespace is always collapsed. Expansions are the aliases of every table term found in
 * the normalized query, in table order, without duplicates and without anything the query
 * already says.
 */
export function normalizeQuery(raw: string, options: NormalizeOptions = {}, synonyms?: SynonymTable): Query {
  const { caseFold = true, stripPunctuation = true, synonymExpand = true } = options;

  let text = raw;
  if (caseFold) {
    text = text.toLowerCase();
  }
  if (stripPunctuation) {
    text = text.replace(/[^\p{L}\p{N}\s]+/gu, ' ');
  }
  const normalized = text.replace(/\s+/g, ' ').trim();

  const expansions: string[] = [];
  if (synonymExpand && normalized) {
    const table = synonyms ?? loadSynonyms();
    const seen = new Set<string>();
    for (const [term, aliases] of table) {
      if (!containsTerm(normalized, term)) {
        continue;
      }
      for (const alias of aliases) {
        const key = alias.toLowerCase();
        if (seen.has(key) || containsTerm(normalized, alias)) {
          continue;
        }
        seen.add(key);
        expansions.push(alias);
      }
    }
  }

  return Object.freeze({
    raw,
    normalized,
    expansions: Object.freeze(expansions),
  });
}
