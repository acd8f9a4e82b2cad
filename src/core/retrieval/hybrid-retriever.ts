import type { RetrievalWeights } from "../config.js";
import { SentinelError, throwIfCancelled } from "../errors.js";
import type { TokenBudgetManager } from "../token-budget.js";
import type { ChangeSet, EvidenceChunk, RetrievalResult, RetrievalSource } from "../types.js";
import type { DocumentStore, GraphHit, RelationalHit, VectorHit } from "./contracts.js";
import { mergeEvidence } from "./merge.js";

export interface RetrievalQuery {
  projectId: string;
  /** Free text for vector search. */
  text: string;
  /** Changed paths and their module names, used as graph entry points. */
  anchors: string[];
}

export interface HybridRetrieverOptions {
  store: DocumentStore;
  weights: RetrievalWeights;
  topK: number;
  maxHops: number;
  relationalLimit: number;
}

export interface FittedEvidence {
  chunks: EvidenceChunk[];
  text: string;
  dropped: number;
}

function stripExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

export function buildRetrievalQuery(changeSet: ChangeSet, projectId: string, description?: string): RetrievalQuery {
  const anchors = new Set<string>();
  const paths = changeSet.files.flatMap((file) => (file.previousPath ? [file.path, file.previousPath] : [file.path]));

  for (const path of paths) {
    anchors.add(path);
    const segments = path.split("/");
    for (let depth = 1; depth < segments.length; depth += 1) {
      anchors.add(segments.slice(0, depth).join("/"));
    }
    const fileName = segments[segments.length - 1];
    if (fileName) anchors.add(stripExtension(fileName));
  }

  const narrative =
    description?.trim() || [changeSet.metadata.title, ...changeSet.metadata.commitSubjects].filter(Boolean).join(". ");
  const text = [narrative, ...anchors].filter(Boolean).join(" ");

  return { projectId, text, anchors: [...anchors] };
}

export function renderEvidenceChunk(chunk: EvidenceChunk): string {
  return `[doc:${chunk.sourceDocId} score=${chunk.combinedScore.toFixed(3)}]\n${chunk.text}`;
}

/** Keeps the best-ranked chunks that fit `maxTokens`; a chunk is never cut mid-text. */
export function fitEvidence(chunks: readonly EvidenceChunk[], maxTokens: number, manager: TokenBudgetManager): FittedEvidence {
  const fitted = manager.fitChunks(chunks, maxTokens, renderEvidenceChunk);
  return { chunks: fitted.kept, text: fitted.text, dropped: fitted.dropped };
}

export class HybridRetriever {
  private readonly options: HybridRetrieverOptions;

  constructor(options: HybridRetrieverOptions) {
    this.options = options;
  }

  async retrieve(query: RetrievalQuery, signal?: AbortSignal): Promise<RetrievalResult> {
    throwIfCancelled(signal);
    const { store, topK, maxHops, relationalLimit } = this.options;

    const [vector, graph, relational] = await Promise.allSettled([
      store.vectorSearch({ projectId: query.projectId, text: query.text, topK }),
      store.graphTraverse({ projectId: query.projectId, anchors: query.anchors, maxHops }),
      store.relationalFilter({ projectId: query.projectId, limit: relationalLimit })
    ]);
    throwIfCancelled(signal);

    // Invalid design documents or input abort the check; only outages degrade a source.
    for (const settled of [vector, graph, relational]) {
      if (settled.status === "rejected" && settled.reason instanceof SentinelError) throw settled.reason;
    }

    const degradedSources: RetrievalSource[] = [];
    const settledHits = <T>(source: RetrievalSource, settled: PromiseSettledResult<T[]>): T[] => {
      if (settled.status === "fulfilled") return settled.value;
      degradedSources.push(source);
      return [];
    };

    const raw = {
      vector: settledHits<VectorHit>("vector", vector),
      graph: settledHits<GraphHit>("graph", graph),
      relational: settledHits<RelationalHit>("relational", relational)
    };

    return { chunks: mergeEvidence(raw, this.options.weights), degradedSources };
  }
}
