import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { config } from "../config/index.js";
import type { ScoredVectorPoint, VectorDistance, VectorPoint, VectorStoreClient } from "./vector-store.js";

const storedPointSchema = z.object({
  id: z.union([z.string(), z.number()]),
  vector: z.array(z.number()),
  payload: z.record(z.unknown())
});

const storedCollectionSchema = z.object({
  size: z.number().int().nonnegative(),
  distance: z.enum(["Euclid", "Cosine"]),
  points: z.array(storedPointSchema)
});

const storeSchema = z.object({
  collections: z.record(storedCollectionSchema).default({})
});

type StoredPoint = z.infer<typeof storedPointSchema>;
type StoredCollection = { size: number; distance: VectorDistance; points: StoredPoint[] };
type StoreShape = { collections: Record<string, StoredCollection> };

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const DEFAULT_LOCAL_STORE_PATH = "data/local-vector-store.json";

export function resolveStorePath(configured: string | undefined = config.LOCAL_VECTOR_STORE_FILE): string {
  const relative = configured && configured.trim().length > 0 ? configured.trim() : DEFAULT_LOCAL_STORE_PATH;
  return path.isAbsolute(relative)
    ? relative
    : path.resolve(process.cwd(), relative);
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    return Number.POSITIVE_INFINITY;
  }

  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const delta = a[i] - b[i];
    sum += delta * delta;
  }
  return Math.sqrt(sum);
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

async function readStore(filePath: string): Promise<StoreShape> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return { collections: {} };
    }
    throw error;
  }

  const parsed = storeSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Local vector store file ${filePath} is malformed: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
  }
  return parsed.data;
}

async function writeStore(filePath: string, store: StoreShape): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(store), "utf8");
}

const requireCollection = (store: StoreShape, collection: string): StoredCollection => {
  const found = store.collections[collection];
  if (!found) {
    throw new Error(`Collection "${collection}" does not exist in the local vector store.`);
  }
  return found;
};

const scorePoint = (collection: StoredCollection, point: StoredPoint, vector: number[]): number =>
  collection.distance === "Euclid"
    ? euclideanDistance(point.vector, vector)
    : cosineSimilarity(point.vector, vector);

export function createLocalVectorStoreClient(filePath: string = resolveStorePath()): VectorStoreClient {
  return {
    async getCollections() {
      const store = await readStore(filePath);
      return {
        collections: Object.keys(store.collections).map((name) => ({ name }))
      };
    },

    async collectionExists(collection) {
      const store = await readStore(filePath);
      return store.collections[collection] !== undefined;
    },

    async createCollection(collection, options) {
      const store = await readStore(filePath);
      store.collections[collection] = {
        size: options.size,
        distance: options.distance,
        points: store.collections[collection]?.points ?? []
      };
      await writeStore(filePath, store);
    },

    async count(collection) {
      const store = await readStore(filePath);
      return store.collections[collection]?.points.length ?? 0;
    },

    async search(collection, request) {
      const store = await readStore(filePath);
      const stored = store.collections[collection];
      if (!stored) {
        return [];
      }

      const direction = stored.distance === "Euclid" ? 1 : -1;
      const scored: ScoredVectorPoint[] = stored.points
        .map((point) => ({
          id: point.id,
          score: scorePoint(stored, point, request.vector),
          payload: point.payload,
          vector: request.withVector ? point.vector : null
        }))
        .sort((a, b) => direction * (a.score - b.score));

      return scored.slice(0, Math.max(0, request.limit));
    },

    async upsert(collection, points: VectorPoint[]) {
      const store = await readStore(filePath);
      const target = requireCollection(store, collection);
      const byId = new Map(target.points.map((point) => [String(point.id), point]));

      for (const point of points) {
        if (point.vector.length !== target.size) {
          throw new Error(
            `Vector size mismatch for point ${String(point.id)}: expected ${target.size}, got ${point.vector.length}.`
          );
        }
        byId.set(String(point.id), {
          id: point.id,
          vector: point.vector,
          payload: point.payload
        });
      }

      target.points = Array.from(byId.values());
      await writeStore(filePath, store);
    }
  };
}
