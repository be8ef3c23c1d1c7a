import type { DatasetEntry } from "../dataset/types.js";

export type RetrievalFilter = {
  documentType?: string;
  keywords: string[];
};

export type RetrievalInput = {
  query: string;
  filter?: unknown;
  k?: number;
  requestId?: string;
};

export type IndexHit = {
  entry: DatasetEntry;
  distance: number;
};

export type RankedCandidate = {
  entry: DatasetEntry;
  similarityScore: number;
  metadataScore: number;
  combinedScore: number;
};

export type ScoringWeights = {
  similarity: number;
  metadata: number;
};

export interface SimilarityIndex {
  size(): Promise<number>;
  /** Nearest entries first, at most `limit` of them. */
  search(vector: readonly number[], limit: number): Promise<IndexHit[]>;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}
