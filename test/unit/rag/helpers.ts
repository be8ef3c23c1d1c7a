import { euclideanDistance } from "../../../src/clients/local-vector-store.js";
import type { DatasetEntry } from "../../../src/modules/dataset/types.js";
import { compareHits } from "../../../src/modules/rag/similarity-index.js";
import type { SimilarityIndex } from "../../../src/modules/rag/types.js";

export const makeEntry = (
  id: string,
  embedding: number[],
  documentType = "article",
  keywords: string[] = []
): DatasetEntry => ({
  id,
  userPrompt: `prompt ${id}`,
  keywords,
  documentType,
  documentStructure: "sections",
  contentElements: "text",
  latexOutput: `\\section{${id}}`,
  embedding
});

/** Exact nearest-neighbour search over a fixed entry list. */
export const createInMemorySimilarityIndex = (entries: readonly DatasetEntry[]): SimilarityIndex => {
  const frozen = Object.freeze([...entries]);
  return {
    async size() {
      return frozen.length;
    },

    async search(vector, limit) {
      return frozen
        .map((entry) => ({ entry, distance: euclideanDistance(entry.embedding, vector) }))
        .sort(compareHits)
        .slice(0, Math.max(0, limit));
    }
  };
};
