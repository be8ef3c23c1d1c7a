import { env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, parseEnv } from "./env.js";
export { env };

export type Config = Readonly<typeof env>;
export const config: Config = Object.freeze({ ...env });

export interface RetrievalSettings {
  topK: number;
  candidatePoolSize: number;
  similarityWeight: number;
  metadataWeight: number;
  fuzzyThreshold: number;
}

export const retrievalSettings: Readonly<RetrievalSettings> = Object.freeze({
  topK: config.RETRIEVAL_TOP_K,
  candidatePoolSize: config.RETRIEVAL_CANDIDATE_POOL,
  similarityWeight: config.RETRIEVAL_SIMILARITY_WEIGHT,
  metadataWeight: config.RETRIEVAL_METADATA_WEIGHT,
  fuzzyThreshold: config.FUZZY_MATCH_THRESHOLD
});

export interface GenerationSettings {
  defaultTemplate: string;
  strictMode: boolean;
  /** Unset means the built-in forbidden set. */
  forbiddenMacros?: readonly string[];
  placeholderDefaults: Readonly<Record<string, string>>;
  completionModel: string;
  completionMaxTokens: number;
}

export const generationSettings: Readonly<GenerationSettings> = Object.freeze({
  defaultTemplate: config.DEFAULT_TEMPLATE,
  strictMode: config.STRICT_MODE,
  forbiddenMacros: config.FORBIDDEN_MACROS,
  placeholderDefaults: config.PLACEHOLDER_DEFAULTS,
  completionModel: config.OPENAI_MODEL,
  completionMaxTokens: config.COMPLETION_MAX_TOKENS
});
