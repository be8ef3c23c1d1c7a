import OpenAI from "openai";
import { config } from "../config/index.js";

type HealthStatus = "ok" | "error";

export interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: "system"; content: string } | { role: "user"; content: string }>;
  max_tokens?: number;
  temperature?: number;
}

export interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}

export interface EmbeddingResponse {
  data: Array<{ index: number; embedding: number[] }>;
}

/** The slice of the OpenAI SDK the service calls. */
export interface OpenAICompatibleClient {
  models: {
    retrieve(model: string, options?: { signal?: AbortSignal }): Promise<unknown>;
  };
  embeddings: {
    create(body: { model: string; input: string | string[] }): Promise<EmbeddingResponse>;
  };
  chat: {
    completions: {
      create(body: ChatCompletionRequest): Promise<ChatCompletionResponse>;
    };
  };
}

export interface OpenAISingleton {
  client: OpenAICompatibleClient;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 60000;
const HEALTH_TIMEOUT_MS = 7000;
const REQUEST_RETRIES = 2;
const REQUEST_RETRY_DELAY_MS = 300;
const MOCK_EMBEDDING_DIMENSIONS = 8;

let singleton: OpenAISingleton | null = null;

const useMockClients = (): boolean => process.env.MOCK_INFRA_CLIENTS === "1";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await operation(controller.signal);
  } finally {
    clearTimeout(timeoutHandle);
  }
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

// Character-bucket vector so mock retrieval stays deterministic across runs.
export function mockEmbedding(text: string): number[] {
  const vector = new Array<number>(MOCK_EMBEDDING_DIMENSIONS).fill(0);
  for (let i = 0; i < text.length; i += 1) {
    vector[text.charCodeAt(i) % MOCK_EMBEDDING_DIMENSIONS] += 1;
  }
  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  return norm === 0 ? vector : vector.map((value) => value / norm);
}

function initialize(): OpenAISingleton {
  if (useMockClients()) {
    const mockClient: OpenAICompatibleClient = {
      models: {
        async retrieve() {
          return { id: config.OPENAI_MODEL };
        }
      },
      embeddings: {
        async create(input: { input: string | string[] }) {
          const values = Array.isArray(input.input) ? input.input : [input.input];
          return {
            data: values.map((value, index) => ({
              index,
              embedding: mockEmbedding(value)
            }))
          };
        }
      },
      chat: {
        completions: {
          async create() {
            return {
              choices: [
                {
                  message: {
                    content: "\\section{Draft}\nThis document was produced by the mock completion client."
                  }
                }
              ],
              usage: { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 }
            };
          }
        }
      }
    };

    console.info("[clients/openai] initialized singleton (mock)");
    return {
      client: mockClient,
      async healthCheck() {
        return { status: "ok" };
      }
    };
  }

  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    maxRetries: REQUEST_RETRIES,
    timeout: REQUEST_TIMEOUT_MS
  });

  console.info("[clients/openai] initialized singleton");

  return {
    client,
    async healthCheck() {
      try {
        await withRetries(async () =>
          withTimeout(async (signal) => {
            await client.models.retrieve(config.OPENAI_MODEL, { signal });
          }, HEALTH_TIMEOUT_MS)
        );
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  console.info("[clients/openai] shutdown complete");
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
