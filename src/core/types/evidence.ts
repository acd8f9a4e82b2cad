export type RetrievalSource = "vector" | "graph" | "relational";

export interface EvidenceChunk {
  sourceDocId: string;
  text: string;
  /** Normalized to [0, 1] within the vector result set. */
  vectorScore: number | null;
  /** Raw hop count from the change's anchors. */
  graphDistance: number | null;
  /** Raw position in the relational result, 0 is most recently approved. */
  relationalRank: number | null;
  combinedScore: number;
}

export interface RetrievalResult {
  chunks: EvidenceChunk[];
  degradedSources: RetrievalSource[];
}
