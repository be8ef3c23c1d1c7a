import { z } from "zod";
import { getQdrantClient } from "../../clients/qdrant.js";
import type { ScoredVectorPoint, VectorDistance } from "../../clients/vector-store.js";
import { config } from "../../config/index.js";
import { logWarn } from "../../observability/logger.js";
import type { DatasetEntry, DatasetRecord } from "../dataset/types.js";
import { RetrieverHealthError } from "./errors.js";
import type { IndexHit, SimilarityIndex } from "./types.js";

export const entryPayloadSchema = z.object({
  entry_id: z.string().min(1),
  user_prompt: z.string(),
  keywords: z.array(z.string()),
  doc_type: z.string(),
  document_structure: z.string(),
  content_elements: z.string(),
  latex_output: z.string()
});

export type EntryPayload = z.infer<typeof entryPayloadSchema>;

export const toEntryPayload = (record: DatasetRecord): EntryPayload => ({
  entry_id: record.id,
  user_prompt: record.userPrompt,
  keywords: [...record.keywords],
  doc_type: record.documentType,
  document_structure: record.documentStructure,
  content_elements: record.contentElements,
  latex_output: record.latexOutput
});

const fromEntryPayload = (payload: EntryPayload, embedding: readonly number[]): DatasetEntry => ({
  id: payload.entry_id,
  userPrompt: payload.user_prompt,
  keywords: payload.keywords,
  documentType: payload.doc_type,
  documentStructure: payload.document_structure,
  contentElements: payload.content_elements,
  latexOutput: payload.latex_output,
  embedding
});

export const compareHits = (a: IndexHit, b: IndexHit): number => {
  if (a.distance !== b.distance) {
    return a.distance - b.distance;
  }
  if (a.entry.id === b.entry.id) {
    return 0;
  }
  return a.entry.id < b.entry.id ? -1 : 1;
};

export interface VectorStoreSimilarityIndexOptions {
  collection: string;
  distance: VectorDistance;
  getQdrantClient?: typeof getQdrantClient;
  logWarn?: typeof logWarn;
}

const toInfrastructureError = (error: unknown): RetrieverHealthError => {
  const message = error instanceof Error ? error.message : "unknown vector store error";
  return new RetrieverHealthError(`Vector store health error: ${message}`);
};

// Cosine collections report similarity, not distance.
const toDistance = (score: number, distance: VectorDistance): number =>
  distance === "Euclid" ? score : Math.max(0, 1 - score);

export const createVectorStoreSimilarityIndex = (options: VectorStoreSimilarityIndexOptions): SimilarityIndex => {
  const resolveClient = options.getQdrantClient ?? getQdrantClient;
  const warn = options.logWarn ?? logWarn;

  return {
    async size() {
      try {
        const { client } = await resolveClient();
        if (!(await client.collectionExists(options.collection))) {
          return 0;
        }
        return await client.count(options.collection);
      } catch (error) {
        throw toInfrastructureError(error);
      }
    },

    async search(vector, limit) {
      if (limit <= 0) {
        return [];
      }

      let points: ScoredVectorPoint[];
      try {
        const { client } = await resolveClient();
        points = await client.search(options.collection, { vector: [...vector], limit, withVector: true });
      } catch (error) {
        throw toInfrastructureError(error);
      }

      const hits: IndexHit[] = [];
      for (const point of points) {
        const payload = entryPayloadSchema.safeParse(point.payload);
        if (!payload.success) {
          continue;
        }
        hits.push({
          entry: fromEntryPayload(payload.data, point.vector ?? []),
          distance: toDistance(point.score, options.distance)
        });
      }

      const dropped = points.length - hits.length;
      if (dropped > 0) {
        warn("rag.index.malformed_points", {}, { collection: options.collection, dropped_point_count: dropped });
      }

      return hits.sort(compareHits).slice(0, limit);
    }
  };
};

let singleton: SimilarityIndex | null = null;

export const getSimilarityIndex = (): SimilarityIndex => {
  if (!singleton) {
    singleton = createVectorStoreSimilarityIndex({
      collection: config.QDRANT_COLLECTION,
      distance: config.VECTOR_DISTANCE
    });
  }
  return singleton;
};

export const resetSimilarityIndexForTests = (): void => {
  singleton = null;
};
