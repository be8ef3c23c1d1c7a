import { QdrantClient } from "@qdrant/js-client-rest";
import { config } from "../config/index.js";
import { createLocalVectorStoreClient } from "./local-vector-store.js";
import { isNumberVector, type VectorStoreClient } from "./vector-store.js";

type HealthStatus = "ok" | "error";

export interface QdrantSingleton {
  client: VectorStoreClient;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 5000;
const REQUEST_RETRIES = 3;
const REQUEST_RETRY_DELAY_MS = 250;

let singleton: QdrantSingleton | null = null;
let initPromise: Promise<QdrantSingleton> | null = null;

const useMockClients = (): boolean => process.env.MOCK_INFRA_CLIENTS === "1";

// In local mode two backends are supported:
// - Qdrant server, when QDRANT_URL is configured
// - file-backed vector store, when QDRANT_URL is omitted
const useLocalFileVectorStore = (): boolean => config.APP_MODE === "local" && !config.QDRANT_URL;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withRetries<T>(operation: () => Promise<T>): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= REQUEST_RETRIES; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < REQUEST_RETRIES) {
        await delay(REQUEST_RETRY_DELAY_MS * attempt);
      }
    }
  }

  throw lastError;
}

export function createQdrantVectorStoreClient(client: QdrantClient): VectorStoreClient {
  return {
    async getCollections() {
      const result = await client.getCollections();
      return { collections: result.collections.map((collection) => ({ name: collection.name })) };
    },

    async collectionExists(collection) {
      const result = await client.collectionExists(collection);
      return result.exists;
    },

    async createCollection(collection, options) {
      await client.createCollection(collection, {
        vectors: { size: options.size, distance: options.distance }
      });
    },

    async count(collection) {
      const result = await client.count(collection, { exact: true });
      return result.count;
    },

    async search(collection, request) {
      const points = await client.search(collection, {
        vector: request.vector,
        limit: request.limit,
        with_payload: true,
        with_vector: request.withVector
      });
      return points.map((point) => ({
        id: point.id,
        score: point.score,
        payload: point.payload ?? {},
        vector: isNumberVector(point.vector) ? point.vector : null
      }));
    },

    async upsert(collection, points) {
      await client.upsert(collection, {
        wait: true,
        points: points.map((point) => ({
          id: point.id,
          vector: point.vector,
          payload: point.payload
        }))
      });
    }
  };
}

const createMockVectorStoreClient = (): VectorStoreClient => ({
  async getCollections() {
    return { collections: [] };
  },
  async collectionExists() {
    return true;
  },
  async createCollection() {
    return;
  },
  async count() {
    return 0;
  },
  async search() {
    return [];
  },
  async upsert() {
    return;
  }
});

async function initialize(): Promise<QdrantSingleton> {
  if (useMockClients()) {
    console.info("[clients/qdrant] initialized singleton (mock)");
    return {
      client: createMockVectorStoreClient(),
      async healthCheck() {
        return { status: "ok" };
      }
    };
  }

  if (useLocalFileVectorStore()) {
    const localClient = createLocalVectorStoreClient();
    console.info("[clients/qdrant] initialized singleton (local file vector store)");
    return {
      client: localClient,
      async healthCheck() {
        try {
          await localClient.getCollections();
          return { status: "ok", details: "local file vector store" };
        } catch (error) {
          const details = error instanceof Error ? error.message : "unknown error";
          return { status: "error", details };
        }
      }
    };
  }

  const url = config.QDRANT_URL;
  if (!url) {
    throw new Error("QDRANT_URL is required when the local file vector store is not in use.");
  }

  const qdrant = new QdrantClient({
    url,
    apiKey: config.QDRANT_API_KEY,
    timeout: REQUEST_TIMEOUT_MS
  });

  await withRetries(async () => {
    await qdrant.getCollections();
  });

  console.info("[clients/qdrant] initialized singleton");
  const client = createQdrantVectorStoreClient(qdrant);

  return {
    client,
    async healthCheck() {
      try {
        const exists = await client.collectionExists(config.QDRANT_COLLECTION);
        return exists
          ? { status: "ok" }
          : { status: "error", details: `collection ${config.QDRANT_COLLECTION} is missing` };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getQdrantClient(): Promise<QdrantSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize();
  }

  singleton = await initPromise;
  return singleton;
}

export async function shutdownQdrantClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  initPromise = null;
  console.info("[clients/qdrant] shutdown complete");
}

export function resetQdrantClientForTests(): void {
  singleton = null;
  initPromise = null;
}
