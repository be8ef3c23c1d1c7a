import { z } from "zod";
import { retrievalSettings, type RetrievalSettings } from "../../config/index.js";
import { logInfo } from "../../observability/logger.js";
import { recordRetrievalLatency } from "../../observability/metrics.js";
import { createOpenAIEmbeddingProvider } from "./embeddings.js";
import { EmptyIndexError, InvalidFilterError } from "./errors.js";
import { rankHits } from "./scoring.js";
import { getSimilarityIndex } from "./similarity-index.js";
import type { RankedCandidate, RetrievalFilter, RetrievalInput, SimilarityIndex } from "./types.js";

export interface RetrieverDependencies {
  now?: () => number;
  getSimilarityIndex?: () => SimilarityIndex;
  embed?: (text: string) => Promise<number[]>;
  settings?: RetrievalSettings;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  logInfo?: typeof logInfo;
}

const defaultEmbeddingProvider = createOpenAIEmbeddingProvider();

const resolveDependencies = (dependencies?: RetrieverDependencies) => ({
  now: dependencies?.now ?? Date.now,
  getSimilarityIndex: dependencies?.getSimilarityIndex ?? getSimilarityIndex,
  embed: dependencies?.embed ?? ((text: string) => defaultEmbeddingProvider.embed(text)),
  settings: dependencies?.settings ?? retrievalSettings,
  recordRetrievalLatency: dependencies?.recordRetrievalLatency ?? recordRetrievalLatency,
  logInfo: dependencies?.logInfo ?? logInfo
});

export const retrievalFilterSchema = z
  .object({
    documentType: z.string().trim().min(1, "documentType must not be blank").optional(),
    keywords: z.array(z.string().trim().min(1, "keywords must not be blank")).default([])
  })
  .strict();

const retrievalRequestSchema = z.object({
  query: z.string().trim().min(1, "query must not be blank"),
  k: z.number().int("k must be an integer").positive("k must be positive").optional(),
  filter: retrievalFilterSchema.optional()
});

const dedupeKeywords = (keywords: string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const keyword of keywords) {
    const key = keyword.toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(keyword);
  }
  return result;
};

export const parseRetrievalRequest = (
  input: RetrievalInput
): { query: string; filter: RetrievalFilter; k: number | undefined } => {
  const parsed = retrievalRequestSchema.safeParse({ query: input.query, k: input.k, filter: input.filter });
  if (!parsed.success) {
    throw new InvalidFilterError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
    );
  }

  const filter = parsed.data.filter;
  return {
    query: parsed.data.query,
    filter: {
      documentType: filter?.documentType,
      keywords: dedupeKeywords(filter?.keywords ?? [])
    },
    k: parsed.data.k
  };
};

/**
 * Ranks the nearest dataset entries for a query. Metadata filters re-rank the
 * candidate pool; they never remove entries from it.
 */
export const retrieve = async (input: RetrievalInput, dependencies?: RetrieverDependencies): Promise<RankedCandidate[]> => {
  const resolved = resolveDependencies(dependencies);
  const startedAt = resolved.now();
  const request = parseRetrievalRequest(input);
  const k = request.k ?? resolved.settings.topK;

  const index = resolved.getSimilarityIndex();
  const size = await index.size();
  if (size === 0) {
    throw new EmptyIndexError();
  }

  const poolSize = Math.min(size, Math.max(k, resolved.settings.candidatePoolSize));
  const vector = await resolved.embed(request.query);
  const hits = await index.search(vector, poolSize);

  const candidates = rankHits(hits, request.filter, {
    weights: {
      similarity: resolved.settings.similarityWeight,
      metadata: resolved.settings.metadataWeight
    },
    threshold: resolved.settings.fuzzyThreshold,
    k
  });

  const latencyMs = resolved.now() - startedAt;
  resolved.recordRetrievalLatency(latencyMs);
  resolved.logInfo(
    "rag.retrieve.complete",
    { requestId: input.requestId ?? null },
    {
      latency_ms: latencyMs,
      index_size: size,
      pool_size: poolSize,
      hit_count: hits.length,
      result_count: candidates.length,
      filtered_by_type: request.filter.documentType !== undefined,
      keyword_count: request.filter.keywords.length,
      metadata_match_count: candidates.filter((candidate) => candidate.metadataScore > 0).length
    }
  );

  return candidates;
};
