import type { RetrievalWeights } from "../config.js";
import { compareStrings } from "../text.js";
import type { EvidenceChunk } from "../types.js";
import type { GraphHit, RelationalHit, VectorHit } from "./contracts.js";

export interface RawRetrievalResults {
  vector: VectorHit[];
  graph: GraphHit[];
  relational: RelationalHit[];
}

interface MergedEntry {
  docId: string;
  text: string;
  vectorScore: number | null;
  graphDistance: number | null;
  graphScore: number;
  relationalRank: number | null;
  relationalScore: number;
}

function chunkKey(docId: string, text: string): string {
  return `${docId}\u0000${text}`;
}

export function normalizeWeights(weights: RetrievalWeights): RetrievalWeights {
  const total = weights.vector + weights.graph + weights.relational;
  if (total <= 0) return { vector: 1 / 3, graph: 1 / 3, relational: 1 / 3 };
  return {
    vector: weights.vector / total,
    graph: weights.graph / total,
    relational: weights.relational / total
  };
}

export function compareEvidence(a: EvidenceChunk, b: EvidenceChunk): number {
  if (a.combinedScore !== b.combinedScore) return b.combinedScore - a.combinedScore;
  const distanceA = a.graphDistance ?? Number.POSITIVE_INFINITY;
  const distanceB = b.graphDistance ?? Number.POSITIVE_INFINITY;
  if (distanceA !== distanceB) return distanceA < distanceB ? -1 : 1;
  return compareStrings(a.sourceDocId, b.sourceDocId) || compareStrings(a.text, b.text);
}

/**
 * Normalizes each source within its own result set, dedupes on (doc, text) keeping the best
 * value per source, and ranks by the weighted sum. Pure; the same inputs give the same order.
 *
 * Every returned hit scores above zero in its source: vector scores are divided by the best score,
 * graph distance by `maxDistance + 1` and relational rank by `maxRank + 1`.
 */
export function mergeEvidence(raw: RawRetrievalResults, weights: RetrievalWeights): EvidenceChunk[] {
  const entries = new Map<string, MergedEntry>();
  const entryFor = (docId: string, text: string): MergedEntry => {
    const key = chunkKey(docId, text);
    let entry = entries.get(key);
    if (!entry) {
      entry = {
        docId,
        text,
        vectorScore: null,
        graphDistance: null,
        graphScore: 0,
        relationalRank: null,
        relationalScore: 0
      };
      entries.set(key, entry);
    }
    return entry;
  };

  if (raw.vector.length) {
    const max = Math.max(...raw.vector.map((hit) => hit.score));
    for (const hit of raw.vector) {
      const normalized = max > 0 ? Math.max(0, hit.score) / max : 0;
      const entry = entryFor(hit.docId, hit.text);
      entry.vectorScore = Math.max(entry.vectorScore ?? 0, normalized);
    }
  }

  if (raw.graph.length) {
    const maxDistance = Math.max(...raw.graph.map((hit) => hit.distance));
    for (const hit of raw.graph) {
      const entry = entryFor(hit.docId, hit.text);
      if (entry.graphDistance !== null && entry.graphDistance <= hit.distance) continue;
      entry.graphDistance = hit.distance;
      entry.graphScore = 1 - Math.max(0, hit.distance) / (maxDistance + 1);
    }
  }

  if (raw.relational.length) {
    const maxRank = Math.max(...raw.relational.map((hit) => hit.rank));
    for (const hit of raw.relational) {
      const entry = entryFor(hit.docId, hit.text);
      if (entry.relationalRank !== null && entry.relationalRank <= hit.rank) continue;
      entry.relationalRank = hit.rank;
      entry.relationalScore = 1 - Math.max(0, hit.rank) / (maxRank + 1);
    }
  }

  const w = normalizeWeights(weights);
  return [...entries.values()]
    .map((entry) => ({
      sourceDocId: entry.docId,
      text: entry.text,
      vectorScore: entry.vectorScore,
      graphDistance: entry.graphDistance,
      relationalRank: entry.relationalRank,
      combinedScore: w.vector * (entry.vectorScore ?? 0) + w.graph * entry.graphScore + w.relational * entry.relationalScore
    }))
    .sort(compareEvidence);
}
