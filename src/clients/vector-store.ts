export type VectorDistance = "Euclid" | "Cosine";

export interface VectorPoint {
  id: string | number;
  vector: number[];
  payload: Record<string, unknown>;
}

/**
 * A search hit as the store reports it. For `Euclid` collections `score` is the
 * L2 distance (smaller is closer); for `Cosine` collections it is the cosine
 * similarity (larger is closer), matching Qdrant.
 */
export interface ScoredVectorPoint {
  id: string | number;
  score: number;
  payload: Record<string, unknown>;
  vector: number[] | null;
}

export interface VectorSearchRequest {
  vector: number[];
  limit: number;
  withVector: boolean;
}

export interface VectorStoreClient {
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
  collectionExists(collection: string): Promise<boolean>;
  createCollection(collection: string, options: { size: number; distance: VectorDistance }): Promise<void>;
  count(collection: string): Promise<number>;
  search(collection: string, request: VectorSearchRequest): Promise<ScoredVectorPoint[]>;
  upsert(collection: string, points: VectorPoint[]): Promise<void>;
}

export const isNumberVector = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((item) => typeof item === "number");
