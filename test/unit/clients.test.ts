import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import Fastify from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  cosineSimilarity,
  createLocalVectorStoreClient,
  euclideanDistance,
  resolveStorePath
} from "../../src/clients/local-vector-store.js";
import { registerClientLifecycle, type ClientLifecycleModules } from "../../src/clients/lifecycle.js";
import { isNumberVector } from "../../src/clients/vector-store.js";

const tempDirs: string[] = [];

const makeTempStorePath = async (): Promise<string> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "latex-rag-store-"));
  tempDirs.push(dir);
  return path.join(dir, "store.json");
};

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe("clients/local-vector-store", () => {
  it("resolves the store path against the working directory", () => {
    expect(resolveStorePath("/var/lib/store.json")).toBe("/var/lib/store.json");
    expect(resolveStorePath("data/custom.json")).toBe(path.resolve(process.cwd(), "data/custom.json"));
    expect(resolveStorePath("  ")).toBe(path.resolve(process.cwd(), "data/local-vector-store.json"));
  });

  it("measures vectors", () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
    expect(euclideanDistance([0], [3, 4])).toBe(Number.POSITIVE_INFINITY);
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
    expect(isNumberVector([0.5, 1])).toBe(true);
    expect(isNumberVector({ dense: [1] })).toBe(false);
  });

  it("creates collections, upserts points and searches by euclidean distance", async () => {
    const client = createLocalVectorStoreClient(await makeTempStorePath());

    await expect(client.getCollections()).resolves.toEqual({ collections: [] });
    await expect(client.collectionExists("examples")).resolves.toBe(false);
    await expect(client.count("examples")).resolves.toBe(0);
    await expect(client.search("examples", { vector: [1, 0], limit: 3, withVector: false })).resolves.toEqual([]);

    await client.createCollection("examples", { size: 2, distance: "Euclid" });
    await client.upsert("examples", [
      { id: "p1", vector: [1, 0], payload: { documentType: "article" } },
      { id: "p2", vector: [0.6, 0.8], payload: { documentType: "report" } },
      { id: "p3", vector: [0, 1], payload: { documentType: "article" } }
    ]);
    await client.upsert("examples", [{ id: "p1", vector: [1, 0], payload: { documentType: "assignment" } }]);

    await expect(client.getCollections()).resolves.toEqual({ collections: [{ name: "examples" }] });
    await expect(client.count("examples")).resolves.toBe(3);

    const hits = await client.search("examples", { vector: [1, 0], limit: 2, withVector: true });
    expect(hits.map((hit) => hit.id)).toEqual(["p1", "p2"]);
    expect(hits[0]).toEqual({ id: "p1", score: 0, payload: { documentType: "assignment" }, vector: [1, 0] });

    await expect(client.search("examples", { vector: [1, 0], limit: -1, withVector: false })).resolves.toEqual([]);
  });

  it("ranks cosine collections by descending similarity and keeps points when recreated", async () => {
    const client = createLocalVectorStoreClient(await makeTempStorePath());
    await client.createCollection("examples", { size: 2, distance: "Cosine" });
    await client.upsert("examples", [
      { id: 1, vector: [1, 0], payload: {} },
      { id: 2, vector: [0.6, 0.8], payload: {} },
      { id: 3, vector: [0, 1], payload: {} }
    ]);
    await client.createCollection("examples", { size: 2, distance: "Cosine" });

    const hits = await client.search("examples", { vector: [0, 1], limit: 5, withVector: false });

    expect(hits.map((hit) => hit.id)).toEqual([3, 2, 1]);
    expect(hits.every((hit) => hit.vector === null)).toBe(true);
  });

  it("rejects upserts into missing collections or with the wrong vector size", async () => {
    const client = createLocalVectorStoreClient(await makeTempStorePath());
    await client.createCollection("examples", { size: 2, distance: "Euclid" });

    await expect(client.upsert("missing", [{ id: "p1", vector: [1, 0], payload: {} }])).rejects.toThrow(
      'Collection "missing" does not exist in the local vector store.'
    );
    await expect(client.upsert("examples", [{ id: "p9", vector: [1, 0, 0], payload: {} }])).rejects.toThrow(
      "Vector size mismatch for point p9: expected 2, got 3."
    );
  });

  it("rejects a malformed store file", async () => {
    const filePath = await makeTempStorePath();
    await fs.writeFile(filePath, JSON.stringify({ collections: { examples: { size: 2 } } }), "utf8");

    await expect(createLocalVectorStoreClient(filePath).getCollections()).rejects.toThrow(
      `Local vector store file ${filePath} is malformed`
    );
  });
});

type RetrieveModel = (model: string, requestOptions?: { signal?: AbortSignal }) => Promise<unknown>;

describe("clients/openai", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.useRealTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.doUnmock("../../src/config/index.js");
    vi.doUnmock("openai");
  });

  async function importOpenAIClientModule(options: {
    mockInfra: boolean;
    retrieve?: RetrieveModel;
  }) {
    vi.stubEnv("MOCK_INFRA_CLIENTS", options.mockInfra ? "1" : "0");
    vi.doMock("../../src/config/index.js", () => ({
      config: {
        OPENAI_API_KEY: "test-key",
        OPENAI_MODEL: "gpt-test"
      }
    }));

    const retrieve: RetrieveModel = options.retrieve ?? (async () => ({ id: "gpt-test" }));
    const retrieveMock = vi.fn(retrieve);
    const OpenAIConstructor = vi.fn(function FakeOpenAI() {
      return { models: { retrieve: retrieveMock } };
    });
    vi.doMock("openai", () => ({ default: OpenAIConstructor }));

    const mod = await import("../../src/clients/openai.js");
    return { mod, OpenAIConstructor, retrieveMock };
  }

  it("uses the in-process mock client when MOCK_INFRA_CLIENTS=1", async () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
    const { mod, OpenAIConstructor } = await importOpenAIClientModule({ mockInfra: true });

    const first = await mod.getOpenAIClient();
    const second = await mod.getOpenAIClient();
    expect(first).toBe(second);
    expect(OpenAIConstructor).not.toHaveBeenCalled();

    await expect(first.healthCheck()).resolves.toEqual({ status: "ok" });
    await expect(first.client.models.retrieve("ignored")).resolves.toEqual({ id: "gpt-test" });
    await expect(first.client.embeddings.create({ model: "embed", input: ["aa", ""] })).resolves.toEqual({
      data: [
        { index: 0, embedding: [0, 1, 0, 0, 0, 0, 0, 0] },
        { index: 1, embedding: [0, 0, 0, 0, 0, 0, 0, 0] }
      ]
    });
    const completion = await first.client.chat.completions.create({
      model: "gpt-test",
      messages: [{ role: "user", content: "Write a report" }]
    });
    expect(completion.choices[0]?.message.content).toBe(
      "\\section{Draft}\nThis document was produced by the mock completion client."
    );

    await mod.shutdownOpenAIClient();
    expect(infoSpy).toHaveBeenCalledWith("[clients/openai] initialized singleton (mock)");
    expect(infoSpy).toHaveBeenCalledWith("[clients/openai] shutdown complete");
  });

  it("constructs the real client and retries health checks after transient errors", async () => {
    vi.useFakeTimers();
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
    let attempts = 0;
    const { mod, OpenAIConstructor, retrieveMock } = await importOpenAIClientModule({
      mockInfra: false,
      retrieve: async () => {
        attempts += 1;
        if (attempts === 1) {
          throw new Error("temporary failure");
        }
        return { id: "gpt-test" };
      }
    });
    const singleton = await mod.getOpenAIClient();

    expect(OpenAIConstructor).toHaveBeenCalledWith({
      apiKey: "test-key",
      baseURL: undefined,
      maxRetries: 2,
      timeout: 60000
    });
    expect(infoSpy).toHaveBeenCalledWith("[clients/openai] initialized singleton");

    const healthPromise = singleton.healthCheck();
    await vi.advanceTimersByTimeAsync(300);

    await expect(healthPromise).resolves.toEqual({ status: "ok" });
    expect(retrieveMock).toHaveBeenCalledTimes(2);
    expect(retrieveMock.mock.calls[0]?.[0]).toBe("gpt-test");
    expect(retrieveMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal);
  });

  it("reports aborted health checks as errors", async () => {
    vi.useFakeTimers();
    const { mod } = await importOpenAIClientModule({
      mockInfra: false,
      retrieve: (_model, requestOptions) =>
        new Promise((_resolve, reject) => {
          requestOptions?.signal?.addEventListener("abort", () => reject(new Error("request aborted")), {
            once: true
          });
        })
    });
    vi.spyOn(console, "info").mockImplementation(() => {});
    const singleton = await mod.getOpenAIClient();

    const healthPromise = singleton.healthCheck();
    await vi.advanceTimersByTimeAsync(15000);

    await expect(healthPromise).resolves.toEqual({ status: "error", details: "request aborted" });
  });
});

describe("clients/qdrant", () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.doUnmock("../../src/config/index.js");
  });

  async function importQdrantClientModule(config: Record<string, unknown>, mockInfra = false) {
    vi.stubEnv("MOCK_INFRA_CLIENTS", mockInfra ? "1" : "0");
    vi.doMock("../../src/config/index.js", () => ({
      config: { QDRANT_COLLECTION: "latex-examples", ...config }
    }));
    return import("../../src/clients/qdrant.js");
  }

  it("uses the in-process mock store when MOCK_INFRA_CLIENTS=1", async () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
    const mod = await importQdrantClientModule({ APP_MODE: "prod" }, true);

    const singleton = await mod.getQdrantClient();

    await expect(singleton.healthCheck()).resolves.toEqual({ status: "ok" });
    await expect(singleton.client.count("latex-examples")).resolves.toBe(0);
    await expect(singleton.client.search("latex-examples", { vector: [1], limit: 1, withVector: false })).resolves.toEqual(
      []
    );
    expect(infoSpy).toHaveBeenCalledWith("[clients/qdrant] initialized singleton (mock)");
  });

  it("falls back to the local file store in local mode without a url", async () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
    const filePath = await makeTempStorePath();
    const mod = await importQdrantClientModule({ APP_MODE: "local", LOCAL_VECTOR_STORE_FILE: filePath });

    const first = await mod.getQdrantClient();
    const second = await mod.getQdrantClient();

    expect(first).toBe(second);
    await expect(first.healthCheck()).resolves.toEqual({ status: "ok", details: "local file vector store" });
    await first.client.createCollection("latex-examples", { size: 2, distance: "Euclid" });
    await expect(first.client.collectionExists("latex-examples")).resolves.toBe(true);

    await mod.shutdownQdrantClient();
    expect(infoSpy).toHaveBeenCalledWith("[clients/qdrant] initialized singleton (local file vector store)");
    expect(infoSpy).toHaveBeenCalledWith("[clients/qdrant] shutdown complete");
  });

  it("requires a url outside local mode", async () => {
    const mod = await importQdrantClientModule({ APP_MODE: "prod" });

    await expect(mod.getQdrantClient()).rejects.toThrow(
      "QDRANT_URL is required when the local file vector store is not in use."
    );
  });
});

describe("clients/lifecycle", () => {
  const createModules = () => {
    const openaiHealth = vi.fn(async () => ({ status: "ok" }));
    const qdrantHealth = vi.fn(async () => ({ status: "ok" }));
    const modules: ClientLifecycleModules = {
      getOpenAIClient: vi.fn(async () => ({ healthCheck: openaiHealth })),
      shutdownOpenAIClient: vi.fn(async () => undefined),
      getQdrantClient: vi.fn(async () => ({ healthCheck: qdrantHealth })),
      shutdownQdrantClient: vi.fn(async () => undefined)
    };
    return { modules, openaiHealth, qdrantHealth, loadClientModules: vi.fn(async () => modules) };
  };

  it("does nothing when bootstrap is disabled", async () => {
    const app = Fastify();
    const { loadClientModules } = createModules();

    registerClientLifecycle(app, { enableBootstrap: false, loadClientModules });
    await app.ready();
    await app.close();

    expect(loadClientModules).not.toHaveBeenCalled();
  });

  it("health checks clients when ready and shuts them down on close", async () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
    const app = Fastify();
    const { modules, openaiHealth, qdrantHealth, loadClientModules } = createModules();

    registerClientLifecycle(app, { enableBootstrap: true, loadClientModules, registerProcessSignals: false });
    await app.ready();

    expect(openaiHealth).toHaveBeenCalledTimes(1);
    expect(qdrantHealth).toHaveBeenCalledTimes(1);
    expect(modules.shutdownOpenAIClient).not.toHaveBeenCalled();

    await app.close();

    expect(modules.shutdownOpenAIClient).toHaveBeenCalledTimes(1);
    expect(modules.shutdownQdrantClient).toHaveBeenCalledTimes(1);
    expect(infoSpy).toHaveBeenCalledWith("[lifecycle/onClose] shutting down infrastructure clients");
  });

  it("registers signal handlers once and exits after shutdown", async () => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    const exit = vi.fn();
    const { modules, loadClientModules } = createModules();
    const sigintBefore = process.listeners("SIGINT");
    const sigtermBefore = process.listeners("SIGTERM");

    registerClientLifecycle(Fastify(), { enableBootstrap: true, loadClientModules, exit });
    registerClientLifecycle(Fastify(), { enableBootstrap: true, loadClientModules, exit });

    const addedSigint = process.listeners("SIGINT").filter((listener) => !sigintBefore.includes(listener));
    const addedSigterm = process.listeners("SIGTERM").filter((listener) => !sigtermBefore.includes(listener));
    try {
      expect(addedSigint).toHaveLength(1);
      expect(addedSigterm).toHaveLength(1);

      addedSigint[0]("SIGINT");

      await vi.waitFor(() => {
        expect(exit).toHaveBeenCalledWith(0);
      });
      expect(modules.shutdownQdrantClient).toHaveBeenCalledTimes(1);
      expect(modules.shutdownOpenAIClient).toHaveBeenCalledTimes(1);
    } finally {
      for (const listener of addedSigint) {
        process.removeListener("SIGINT", listener);
      }
      for (const listener of addedSigterm) {
        process.removeListener("SIGTERM", listener);
      }
    }
  });
});
