export interface VectorHit {
  docId: string;
  text: string;
  score: number;
}

export interface GraphHit {
  docId: string;
  text: string;
  /** Hops from the nearest anchor node. */
  distance: number;
}

export interface RelationalHit {
  docId: string;
  text: string;
  /** 0 is the most recently approved document. */
  rank: number;
}

export interface VectorQuery {
  projectId: string;
  text: string;
  topK: number;
}

export interface GraphQuery {
  projectId: string;
  anchors: string[];
  maxHops: number;
}

export interface RelationalQuery {
  projectId: string;
  limit: number;
}

/** Read-only view of the design-document corpus. */
export interface DocumentStore {
  vectorSearch(query: VectorQuery): Promise<VectorHit[]>;
  graphTraverse(query: GraphQuery): Promise<GraphHit[]>;
  relationalFilter(query: RelationalQuery): Promise<RelationalHit[]>;
}
