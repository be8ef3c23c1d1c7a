import crypto from "node:crypto";
import { getQdrantClient } from "../../clients/qdrant.js";
import type { VectorDistance, VectorPoint } from "../../clients/vector-store.js";
import { logInfo } from "../../observability/logger.js";
import { embedTexts } from "../rag/embeddings.js";
import { toEntryPayload } from "../rag/similarity-index.js";
import { buildEmbeddingText, DatasetFormatError, loadDataset } from "./dataset-loader.js";

const DEFAULT_BATCH_SIZE = 32;

export interface BuildIndexOptions {
  datasetFile: string;
  collection: string;
  distance: VectorDistance;
  batchSize?: number;
}

export interface IndexBuilderDependencies {
  now?: () => number;
  loadDataset?: typeof loadDataset;
  embedTexts?: (texts: string[]) => Promise<number[][]>;
  getQdrantClient?: typeof getQdrantClient;
  logInfo?: typeof logInfo;
}

export interface BuildIndexResult {
  collection: string;
  indexedCount: number;
  dimensions: number;
  latencyMs: number;
}

const resolveDependencies = (dependencies?: IndexBuilderDependencies) => ({
  now: dependencies?.now ?? Date.now,
  loadDataset: dependencies?.loadDataset ?? loadDataset,
  embedTexts: dependencies?.embedTexts ?? ((texts: string[]) => embedTexts(texts)),
  getQdrantClient: dependencies?.getQdrantClient ?? getQdrantClient,
  logInfo: dependencies?.logInfo ?? logInfo
});

// Same entry id, same point id: re-running the build overwrites instead of duplicating.
export const pointIdFor = (entryId: string): string => {
  const hex = crypto.createHash("sha1").update(`latex-dataset:${entryId}`).digest("hex");
  const variant = ((Number.parseInt(hex[16], 16) & 0x3) | 0x8).toString(16);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(17, 20)}`,
    hex.slice(20, 32)
  ].join("-");
};

const toBatches = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
};

export const buildIndex = async (
  options: BuildIndexOptions,
  dependencies?: IndexBuilderDependencies
): Promise<BuildIndexResult> => {
  const resolved = resolveDependencies(dependencies);
  const startedAt = resolved.now();
  const records = await resolved.loadDataset(options.datasetFile);
  if (records.length === 0) {
    throw new DatasetFormatError(`Dataset file ${options.datasetFile} holds no rows.`);
  }

  const points: VectorPoint[] = [];
  for (const batch of toBatches(records, Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE))) {
    const vectors = await resolved.embedTexts(batch.map(buildEmbeddingText));
    batch.forEach((record, index) => {
      points.push({ id: pointIdFor(record.id), vector: vectors[index], payload: toEntryPayload(record) });
    });
  }

  const dimensions = points[0].vector.length;
  const { client } = await resolved.getQdrantClient();
  if (!(await client.collectionExists(options.collection))) {
    await client.createCollection(options.collection, { size: dimensions, distance: options.distance });
  }
  await client.upsert(options.collection, points);

  const latencyMs = resolved.now() - startedAt;
  resolved.logInfo(
    "dataset.index.built",
    {},
    { collection: options.collection, indexed_count: points.length, dimensions, latency_ms: latencyMs }
  );

  return { collection: options.collection, indexedCount: points.length, dimensions, latencyMs };
};
