import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Answer } from '../types/rag.js';

export const EvalRecordSchema = z.object({
  query: z.string().min(1),
  relevant_ids: z.array(z.string().min(1)),
  description: z.string().optional(),
});

export type EvalRecord = z.infer<typeof EvalRecordSchema>;

export interface QueryEvaluation {
  query: string;
  description?: string;
  retrieved: string[];
  precision: number;
  recall: number;
}

export interface RetrievalReport {
  k: number;
  samples: number;
  meanPrecision: number;
  meanRecall: number;
  results: QueryEvaluation[];
}

/**
 * Share of the top `k` retrieved ids that are relevant. 0 when nothing was retrieved.
 */
export function precisionAtK(retrieved: readonly string[], relevant: readonly string[], k: number): number {
  if (retrieved.length === 0) {
    return 0;
  }
  const topK = retrieved.slice(0, k);
  const relevantSet = new Set(relevant);
  const truePositives = topK.filter((id) => relevantSet.has(id)).length;
  return truePositives / Math.min(k, topK.length);
}

/**
 * Share of the relevant ids found in the top `k`. 0 when there are no relevant ids.
 */
export function recallAtK(retrieved: readonly string[], relevant: readonly string[], k: number): number {
  if (relevant.length === 0) {
    return 0;
  }
  const topK = retrieved.slice(0, k);
  const relevantSet = new Set(relevant);
  const truePositives = topK.filter((id) => relevantSet.has(id)).length;
  return truePositives / relevant.length;
}

/**
 * Parse a JSONL eval set. Blank lines are skipped.
 */
export function parseEvalSet(contents: string): EvalRecord[] {
  const records: EvalRecord[] = [];
  for (const [index, line] of contents.split(/\r?\n/).entries()) {
    if (!line.trim()) {
      continue;
    }
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      throw new Error(`Eval file line ${index + 1}: invalid JSON`);
    }
    const result = EvalRecordSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new Error(`Eval file line ${index + 1}: ${issues}`);
    }
    records.push(result.data);
  }
  return records;
}

export async function loadEvalSet(path: string): Promise<EvalRecord[]> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf-8');
  } catch (error) {
    throw new Error(`Eval file could not be read: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }
  return parseEvalSet(contents);
}

function sourceOf(id: string): string {
  const hash = id.lastIndexOf('#');
  return hash === -1 ? id : id.slice(0, hash);
}

/**
 * When a record only names sources (no `#n` chunk suffix), retrieved chunk ids are
 * compared by source, each source counted once.
 */
function alignIds(retrieved: readonly string[], relevant: readonly string[]): string[] {
  if (relevant.some((id) => id.includes('#'))) {
    return [...retrieved];
  }
  return Array.from(new Set(retrieved.map(sourceOf)));
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Run every record through `retrieveIds` and compute precision@k and recall@k.
 */
export async function evaluateRetrieval(
  records: readonly EvalRecord[],
  retrieveIds: (query: string, k: number) => Promise<string[]>,
  k: number
): Promise<RetrievalReport> {
  const results: QueryEvaluation[] = [];
  for (const record of records) {
    const retrieved = alignIds(await retrieveIds(record.query, k), record.relevant_ids);
    results.push({
      query: record.query,
      ...(record.description ? { description: record.description } : {}),
      retrieved,
      precision: precisionAtK(retrieved, record.relevant_ids, k),
      recall: recallAtK(retrieved, record.relevant_ids, k),
    });
  }

  return {
    k,
    samples: results.length,
    meanPrecision: mean(results.map((r) => r.precision)),
    meanRecall: mean(results.map((r) => r.recall)),
    results,
  };
}

/**
 * Share of claim-bearing segments, across all answers, that carry at least one citation.
 * 1 when there are no claims.
 */
export function citationCoverage(answers: readonly Answer[]): number {
  let claims = 0;
  let cited = 0;
  for (const answer of answers) {
    for (const segment of answer.segments) {
      if (segment.isClaim) {
        claims++;
        if (segment.citations.length > 0) {
          cited++;
        }
      }
    }
  }
  return claims === 0 ? 1 : cited / claims;
}
