import { getOpenAIClient, type ChatCompletionResponse } from "../../clients/openai.js";
import { generationSettings } from "../../config/index.js";
import { recordCompletionLatency, recordCompletionUsage } from "../../observability/metrics.js";
import { CompletionProviderError } from "./errors.js";

export interface CompletionProvider {
  complete(prompt: string): Promise<string>;
}

const TEXT_KEYS = ["response", "text", "output", "content"] as const;
const CHOICE_KEYS = ["message", "text", "content"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const contentPartText = (part: unknown): string => {
  if (typeof part === "string") {
    return part;
  }
  if (isRecord(part) && typeof part.text === "string") {
    return part.text;
  }
  return "";
};

/**
 * Reduces whatever a completion backend returned to plain text: strings,
 * content-part arrays, `{ response | text | output }` objects and
 * `{ choices: [...] }` envelopes. Anything else is serialized as JSON.
 */
export const normalizeCompletionPayload = (payload: unknown): string => {
  if (payload === null || payload === undefined) {
    return "";
  }
  if (typeof payload === "string") {
    return payload;
  }
  if (Array.isArray(payload)) {
    return payload.map(contentPartText).join("");
  }
  if (isRecord(payload)) {
    for (const key of TEXT_KEYS) {
      if (key in payload) {
        return normalizeCompletionPayload(payload[key]);
      }
    }
    const choices = payload.choices;
    if (Array.isArray(choices) && choices.length > 0) {
      const [choice] = choices;
      if (isRecord(choice)) {
        for (const key of CHOICE_KEYS) {
          if (key in choice) {
            return normalizeCompletionPayload(choice[key]);
          }
        }
      }
    }
  }
  return JSON.stringify(payload);
};

export interface OpenAICompletionOptions {
  model?: string;
  maxTokens?: number;
  now?: () => number;
  getOpenAIClient?: typeof getOpenAIClient;
  recordCompletionLatency?: typeof recordCompletionLatency;
  recordCompletionUsage?: typeof recordCompletionUsage;
}

export const createOpenAICompletionProvider = (options: OpenAICompletionOptions = {}): CompletionProvider => {
  const now = options.now ?? Date.now;
  const resolveClient = options.getOpenAIClient ?? getOpenAIClient;
  const recordLatency = options.recordCompletionLatency ?? recordCompletionLatency;
  const recordUsage = options.recordCompletionUsage ?? recordCompletionUsage;

  return {
    async complete(prompt) {
      const startedAt = now();
      let response: ChatCompletionResponse;
      try {
        const { client } = await resolveClient();
        response = await client.chat.completions.create({
          model: options.model ?? generationSettings.completionModel,
          max_tokens: options.maxTokens ?? generationSettings.completionMaxTokens,
          messages: [{ role: "user", content: prompt }]
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : "unknown completion error";
        throw new CompletionProviderError(`Model call failed: ${message}`);
      } finally {
        recordLatency(now() - startedAt);
      }

      if (response.usage) {
        recordUsage({
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens,
          totalTokens: response.usage.total_tokens
        });
      }
      return normalizeCompletionPayload(response);
    }
  };
};
