/**
 * Turn raw index hits into scored candidates.
 */

import type { IndexHit } from '../storage/types.js';
import type { Candidate, DocumentLookup, RetrieverKind } from './types.js';
import { compareIds } from './score-fusion.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('hydrate');

/**
 * Resolve hits to documents, drop hits whose document is gone, keep the best
 * score per id and order by score descending then id.
 */
export async function hydrateHits(
  kbId: string,
  hits: readonly IndexHit[],
  retriever: RetrieverKind,
  lookup: DocumentLookup,
): Promise<Candidate[]> {
  if (hits.length === 0) return [];

  const best = new Map<string, number>();
  for (const hit of hits) {
    const existing = best.get(hit.id);
    if (existing === undefined || hit.score > existing) best.set(hit.id, hit.score);
  }

  const documents = await lookup.getDocuments(kbId, [...best.keys()]);
  const candidates: Candidate[] = [];
  for (const [id, score] of best) {
    const document = documents.get(id);
    if (!document) {
      log.debug('Dropping hit without a document', { kbId, id, retriever });
      continue;
    }
    candidates.push({ document, score, origin: retriever, sources: [retriever] });
  }

  candidates.sort((a, b) => b.score - a.score || compareIds(a.document.id, b.document.id));
  return candidates;
}
