import { getOpenAIClient, type EmbeddingResponse } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { RetrieverHealthError } from "./errors.js";
import type { EmbeddingProvider } from "./types.js";

export interface OpenAIEmbeddingOptions {
  model?: string;
  getEnv?: (name: string) => string | undefined;
  getOpenAIClient?: typeof getOpenAIClient;
}

const readEnv = (name: string): string | undefined => {
  const value = process.env[name];
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
};

export const embedTexts = async (
  texts: string[],
  options: OpenAIEmbeddingOptions = {}
): Promise<number[][]> => {
  const getEnv = options.getEnv ?? readEnv;
  if (!getEnv("OPENAI_API_KEY")) {
    throw new RetrieverHealthError("Retriever health error: OPENAI_API_KEY is missing.");
  }
  if (texts.length === 0) {
    return [];
  }

  let response: EmbeddingResponse;
  try {
    const { client } = await (options.getOpenAIClient ?? getOpenAIClient)();
    response = await client.embeddings.create({
      model: options.model ?? config.OPENAI_EMBEDDING_MODEL,
      input: texts
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown embedding error";
    throw new RetrieverHealthError(`Embedding health error: ${message}`);
  }

  const vectors = [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  if (vectors.length !== texts.length || vectors.some((vector) => vector.length === 0)) {
    throw new RetrieverHealthError("Embedding response missing vector payload.");
  }
  return vectors;
};

export const createOpenAIEmbeddingProvider = (options: OpenAIEmbeddingOptions = {}): EmbeddingProvider => ({
  async embed(text) {
    const [vector] = await embedTexts([text], options);
    return vector;
  }
});
