import Fastify from "fastify";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  isLogLevelEnabled,
  logError,
  logInfo,
  logWarn,
  parseConfiguredLogLevel
} from "../../src/observability/logger.js";
import {
  getMetricsSnapshot,
  recordCompletionUsage,
  recordErrorRate,
  recordGenerationOutcome,
  recordRetrievalLatency,
  registerMetricsRoutes,
  registerRequestMetricsHooks,
  resetMetrics
} from "../../src/observability/metrics.js";

describe("observability/logger", () => {
  it("parses configured levels", () => {
    expect(parseConfiguredLogLevel(" DEBUG ")).toBe("debug");
    expect(parseConfiguredLogLevel("verbose")).toBe("info");
    expect(parseConfiguredLogLevel(undefined)).toBe("info");
  });

  it("emits JSON lines at or above the configured level", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});

    logError("generation.pipeline.failed", { requestId: "req-1" }, { error_name: "StrictValidationError" });
    logWarn("generation.placeholders.unresolved", { requestId: "req-1" });
    logInfo("rag.retrieve.complete", {});

    expect(isLogLevelEnabled("error")).toBe(true);
    expect(isLogLevelEnabled("warn")).toBe(false);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toMatchObject({
      level: "error",
      event: "generation.pipeline.failed",
      request_id: "req-1",
      document_id: null,
      error_name: "StrictValidationError"
    });
    expect(warnSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
  });

  it("writes the document id it is given", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    logError("generation.pipeline.failed", { requestId: "req-2", documentId: "doc-1" });

    expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toMatchObject({
      request_id: "req-2",
      document_id: "doc-1"
    });
  });
});

describe("observability/metrics", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("summarizes latencies, usage and outcomes", () => {
    recordRetrievalLatency(10);
    recordRetrievalLatency(20.5);
    recordRetrievalLatency(Number.NaN);
    recordCompletionUsage({ promptTokens: 3, totalTokens: 5 });
    recordCompletionUsage({ completionTokens: 2, totalTokens: 2 });
    recordGenerationOutcome("success");
    recordGenerationOutcome("success");
    recordGenerationOutcome("StrictValidationError");
    recordErrorRate("strict_422");

    expect(getMetricsSnapshot()).toEqual({
      request_latency: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      retrieval_latency: { count: 3, avgMs: 10.17, minMs: 0, maxMs: 20.5 },
      completion_latency: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      generation_latency: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      completion_usage: { promptTokens: 3, completionTokens: 2, totalTokens: 7 },
      generation_outcomes: { success: 2, StrictValidationError: 1 },
      error_rates: { strict_422: 1 }
    });
  });

  it("serves the snapshot and tags responses with the request id", async () => {
    const app = Fastify();
    try {
      registerRequestMetricsHooks(app);
      await registerMetricsRoutes(app);

      const response = await app.inject({ method: "GET", url: "/metrics" });

      expect(response.statusCode).toBe(200);
      expect(response.headers["x-request-id"]).toEqual(expect.any(String));
      expect(response.json()).toHaveProperty("generation_outcomes", {});
    } finally {
      await app.close();
    }
  });
});
