import type { DatasetEntry } from "../dataset/types.js";
import { fuzzyMatches } from "./fuzzy-match.js";
import type { IndexHit, RankedCandidate, RetrievalFilter, ScoringWeights } from "./types.js";

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  similarity: 0.5,
  metadata: 0.5
});

const DOCUMENT_TYPE_COMPONENT = 0.5;
const KEYWORD_COMPONENT = 0.5;

export const distanceToSimilarity = (distance: number): number => {
  if (Number.isNaN(distance)) {
    return 0;
  }
  return 1 / (1 + Math.max(0, distance));
};

export const countMatchedKeywords = (
  entry: DatasetEntry,
  keywords: readonly string[],
  threshold: number
): number => keywords.filter((keyword) => fuzzyMatches(keyword, entry.keywords, threshold)).length;

export const computeMetadataScore = (
  entry: DatasetEntry,
  filter: RetrievalFilter,
  threshold: number
): number => {
  const typeMatch =
    filter.documentType !== undefined && fuzzyMatches(filter.documentType, entry.documentType, threshold) ? 1 : 0;
  const keywordFraction =
    filter.keywords.length > 0 ? countMatchedKeywords(entry, filter.keywords, threshold) / filter.keywords.length : 0;

  return DOCUMENT_TYPE_COMPONENT * typeMatch + KEYWORD_COMPONENT * keywordFraction;
};

export const scoreHit = (
  hit: IndexHit,
  filter: RetrievalFilter,
  weights: ScoringWeights,
  threshold: number
): RankedCandidate => {
  const similarityScore = distanceToSimilarity(hit.distance);
  const metadataScore = computeMetadataScore(hit.entry, filter, threshold);
  return {
    entry: hit.entry,
    similarityScore,
    metadataScore,
    combinedScore: weights.similarity * similarityScore + weights.metadata * metadataScore
  };
};

export const compareCandidates = (a: RankedCandidate, b: RankedCandidate): number => {
  if (a.combinedScore !== b.combinedScore) {
    return b.combinedScore - a.combinedScore;
  }
  if (a.entry.id === b.entry.id) {
    return 0;
  }
  return a.entry.id < b.entry.id ? -1 : 1;
};

export interface RankOptions {
  weights: ScoringWeights;
  threshold: number;
  k: number;
}

/**
 * Scores every hit and keeps the best `k`. Filters only move candidates up,
 * so unmatched neighbours still fill the remaining slots.
 */
export const rankHits = (hits: readonly IndexHit[], filter: RetrievalFilter, options: RankOptions): RankedCandidate[] => {
  const seen = new Set<string>();
  const unique = hits.filter((hit) => {
    if (seen.has(hit.entry.id)) {
      return false;
    }
    seen.add(hit.entry.id);
    return true;
  });

  return unique
    .map((hit) => scoreHit(hit, filter, options.weights, options.threshold))
    .sort(compareCandidates)
    .slice(0, options.k);
};
