import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface CompletionUsageSummary {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  completionLatency: LatencySummary;
  generationLatency: LatencySummary;
  completionUsage: CompletionUsageSummary;
  generationOutcomes: Record<string, number>;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createUsageSummary = (): CompletionUsageSummary => ({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0
});

const state: MetricsState = {
  requestLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  completionLatency: createLatencySummary(),
  generationLatency: createLatencySummary(),
  completionUsage: createUsageSummary(),
  generationOutcomes: {},
  errorRates: {}
};

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordCompletionLatency = (durationMs: number): void => {
  recordLatency(state.completionLatency, durationMs);
};

export const recordGenerationLatency = (durationMs: number): void => {
  recordLatency(state.generationLatency, durationMs);
};

export const recordCompletionUsage = (usage: {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}): void => {
  state.completionUsage.promptTokens += usage.promptTokens ?? 0;
  state.completionUsage.completionTokens += usage.completionTokens ?? 0;
  state.completionUsage.totalTokens += usage.totalTokens ?? 0;
};

export const recordGenerationOutcome = (outcome: string): void => {
  state.generationOutcomes[outcome] = (state.generationOutcomes[outcome] ?? 0) + 1;
};

export const recordErrorRate = (key: string): void => {
  state.errorRates[key] = (state.errorRates[key] ?? 0) + 1;
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  completion_latency: serializeLatency(state.completionLatency),
  generation_latency: serializeLatency(state.generationLatency),
  completion_usage: { ...state.completionUsage },
  generation_outcomes: { ...state.generationOutcomes },
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state.requestLatency = createLatencySummary();
  state.retrievalLatency = createLatencySummary();
  state.completionLatency = createLatencySummary();
  state.generationLatency = createLatencySummary();
  state.completionUsage = createUsageSummary();
  state.generationOutcomes = {};
  state.errorRates = {};
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    requestStartTimes.set(request, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    recordRequestLatency(Date.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });
};
