import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: typeof fs.existsSync;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): void {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? ((filePath: string, encoding: "utf8") => fs.readFileSync(filePath, encoding));
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }
}

loadModeEnvFile();

const runtimeModeSchema = z.enum(["prod", "local"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });

const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const commaListSchema = z
  .string()
  .optional()
  .transform((value) => {
    if (!value || value.trim().length === 0) {
      return undefined;
    }
    const items = value
      .split(",")
      .map((item) => item.trim().replace(/^\\/, ""))
      .filter((item) => item.length > 0);
    return items.length > 0 ? items : undefined;
  });

const placeholderDefaultsSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (!value || value.trim().length === 0) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "PLACEHOLDER_DEFAULTS must be a JSON object"
      });
      return z.NEVER;
    }
    const record = z.record(z.string()).safeParse(parsed);
    if (!record.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "PLACEHOLDER_DEFAULTS values must be strings"
      });
      return z.NEVER;
    }
    return record.data;
  });

const unitIntervalSchema = z.coerce.number().min(0).max(1);

export const envSchema = z
  .object({
    APP_MODE: runtimeModeSchema.default("prod"),
    PORT: z.coerce.number().int().positive().default(3000),
    CORS_ORIGINS: z.string().min(1).default("http://localhost:5173"),
    ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
    OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
    OPENAI_BASE_URL: optionalTrimmedString,
    OPENAI_MODEL: z.string().min(1, "OPENAI_MODEL is required"),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    COMPLETION_MAX_TOKENS: z.coerce.number().int().positive().default(1800),
    QDRANT_URL: optionalTrimmedString,
    QDRANT_API_KEY: optionalTrimmedString,
    QDRANT_COLLECTION: z.string().min(1, "QDRANT_COLLECTION is required"),
    VECTOR_DISTANCE: z.enum(["Euclid", "Cosine"]).default("Euclid"),
    LOCAL_VECTOR_STORE_FILE: optionalTrimmedString,
    DATASET_FILE: z.string().min(1).default("data/dataset.json"),
    RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),
    RETRIEVAL_CANDIDATE_POOL: z.coerce.number().int().positive().default(50),
    RETRIEVAL_SIMILARITY_WEIGHT: unitIntervalSchema.default(0.5),
    RETRIEVAL_METADATA_WEIGHT: unitIntervalSchema.default(0.5),
    FUZZY_MATCH_THRESHOLD: unitIntervalSchema.default(0.8),
    DEFAULT_TEMPLATE: z.string().min(1).default("article_minimal"),
    STRICT_MODE: booleanFlagSchema.default(false),
    FORBIDDEN_MACROS: commaListSchema,
    PLACEHOLDER_DEFAULTS: placeholderDefaultsSchema
  })
  .superRefine((value, ctx) => {
    if (value.APP_MODE === "prod" && !value.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required in prod mode"
      });
    }

    const weightSum = value.RETRIEVAL_SIMILARITY_WEIGHT + value.RETRIEVAL_METADATA_WEIGHT;
    if (Math.abs(weightSum - 1) > 1e-9) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RETRIEVAL_METADATA_WEIGHT"],
        message: "RETRIEVAL_SIMILARITY_WEIGHT and RETRIEVAL_METADATA_WEIGHT must sum to 1"
      });
    }
    if (value.RETRIEVAL_SIMILARITY_WEIGHT < value.RETRIEVAL_METADATA_WEIGHT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RETRIEVAL_SIMILARITY_WEIGHT"],
        message: "RETRIEVAL_SIMILARITY_WEIGHT must be at least RETRIEVAL_METADATA_WEIGHT"
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}

export const env: Env = parseEnv(process.env);
