import { randomUUID } from "node:crypto";
import { generationSettings, type GenerationSettings } from "../../config/index.js";
import { logError, logTrace, logWarn } from "../../observability/logger.js";
import { recordGenerationLatency, recordGenerationOutcome } from "../../observability/metrics.js";
import { buildGenerationPrompt } from "../../prompts/index.js";
import { DEFAULT_FORBIDDEN_MACROS } from "../latex/forbidden-macros.js";
import { GenerationDocument } from "../latex/generation-document.js";
import { DEFAULT_PLACEHOLDER_VALUES, type PlaceholderValues } from "../latex/placeholders.js";
import { sanitize } from "../latex/sanitizer.js";
import { enforceTemplate } from "../latex/template-enforcer.js";
import { getTemplate } from "../latex/templates.js";
import { retrieve } from "../rag/retriever.js";
import type { RankedCandidate, RetrievalInput } from "../rag/types.js";
import { createOpenAICompletionProvider, type CompletionProvider } from "./completion-adapter.js";
import { documentSpecToPrompt } from "./document-spec.js";
import { InvalidGenerationRequestError } from "./errors.js";
import type { GenerationExample, GenerationRequest, GenerationResult } from "./types.js";

export interface GenerationPipelineDependencies {
  now?: () => number;
  createDocumentId?: () => string;
  retrieve?: (input: RetrievalInput) => Promise<RankedCandidate[]>;
  completionProvider?: CompletionProvider;
  settings?: GenerationSettings;
  logTrace?: typeof logTrace;
  logWarn?: typeof logWarn;
  logError?: typeof logError;
  recordGenerationLatency?: typeof recordGenerationLatency;
  recordGenerationOutcome?: typeof recordGenerationOutcome;
}

let defaultCompletionProvider: CompletionProvider | null = null;

const getDefaultCompletionProvider = (): CompletionProvider => {
  if (!defaultCompletionProvider) {
    defaultCompletionProvider = createOpenAICompletionProvider();
  }
  return defaultCompletionProvider;
};

const resolveDependencies = (dependencies?: GenerationPipelineDependencies) => ({
  now: dependencies?.now ?? Date.now,
  createDocumentId: dependencies?.createDocumentId ?? (() => randomUUID()),
  retrieve: dependencies?.retrieve ?? ((input: RetrievalInput) => retrieve(input)),
  completionProvider: dependencies?.completionProvider ?? getDefaultCompletionProvider(),
  settings: dependencies?.settings ?? generationSettings,
  logTrace: dependencies?.logTrace ?? logTrace,
  logWarn: dependencies?.logWarn ?? logWarn,
  logError: dependencies?.logError ?? logError,
  recordGenerationLatency: dependencies?.recordGenerationLatency ?? recordGenerationLatency,
  recordGenerationOutcome: dependencies?.recordGenerationOutcome ?? recordGenerationOutcome
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// The document spec's type fills the filter only where the request left it out.
const withDocumentType = (filter: unknown, documentType: string | undefined): unknown => {
  if (documentType === undefined) {
    return filter;
  }
  if (filter === undefined) {
    return { documentType };
  }
  if (isRecord(filter) && filter.documentType === undefined) {
    return { ...filter, documentType };
  }
  return filter;
};

const resolveUserRequest = (request: GenerationRequest): string => {
  if (request.documentSpec) {
    return documentSpecToPrompt(request.documentSpec);
  }
  const prompt = request.prompt?.trim();
  if (!prompt) {
    throw new InvalidGenerationRequestError(["prompt: either prompt or documentSpec is required"]);
  }
  return prompt;
};

const resolvePlaceholderValues = (request: GenerationRequest): PlaceholderValues => ({
  TITLE: request.documentSpec?.title,
  AUTHOR: request.documentSpec?.author,
  ...request.placeholderValues
});

const toExample = (candidate: RankedCandidate): GenerationExample => ({
  id: candidate.entry.id,
  documentType: candidate.entry.documentType,
  similarityScore: candidate.similarityScore,
  metadataScore: candidate.metadataScore,
  combinedScore: candidate.combinedScore
});

/**
 * Retrieves examples, asks the model for a body and forces the answer into
 * the requested template. Collaborator errors are logged and rethrown.
 */
export const generate = async (
  request: GenerationRequest,
  dependencies?: GenerationPipelineDependencies
): Promise<GenerationResult> => {
  const resolved = resolveDependencies(dependencies);
  const startedAt = resolved.now();
  const documentId = resolved.createDocumentId();
  const context = { requestId: request.requestId ?? null, documentId };
  const templateName = request.templateName ?? resolved.settings.defaultTemplate;
  const strict = request.strict ?? resolved.settings.strictMode;
  const forbiddenMacros = resolved.settings.forbiddenMacros ?? DEFAULT_FORBIDDEN_MACROS;

  const traceStage = (stage: string, fields: Record<string, unknown> = {}): void => {
    resolved.logTrace("generation.pipeline.stage", context, { stage, ...fields });
  };

  try {
    const template = getTemplate(templateName);
    traceStage("template_resolved", { template: template.name, strict });

    const userRequest = resolveUserRequest(request);
    const candidates = await resolved.retrieve({
      query: userRequest,
      filter: withDocumentType(request.filter, request.documentSpec?.document_type),
      k: request.k,
      requestId: request.requestId
    });
    traceStage("retrieved", { example_ids: candidates.map((candidate) => candidate.entry.id) });

    const prompt = buildGenerationPrompt({
      userRequest,
      examples: candidates.map((candidate) => candidate.entry),
      templateProvided: true
    });
    traceStage("prompt_built", { prompt_length: prompt.length });

    const rawText = await resolved.completionProvider.complete(prompt);
    traceStage("completed", { raw_length: rawText.length });

    const document = new GenerationDocument(rawText, strict, documentId);
    document.markSanitized(sanitize(rawText, { strict, forbiddenMacros }));
    traceStage(document.stage, { sanitized_length: document.text.length });

    enforceTemplate(document, {
      templateName: template.name,
      placeholderValues: resolvePlaceholderValues(request),
      defaults: { ...DEFAULT_PLACEHOLDER_VALUES, ...resolved.settings.placeholderDefaults },
      forbiddenMacros
    });
    traceStage(document.stage);

    const unresolvedPlaceholders = [...document.unresolvedPlaceholders];
    if (unresolvedPlaceholders.length > 0) {
      resolved.logWarn("generation.placeholders.unresolved", context, { placeholders: unresolvedPlaceholders });
    }

    const latencyMs = resolved.now() - startedAt;
    resolved.recordGenerationLatency(latencyMs);
    resolved.recordGenerationOutcome("success");

    return {
      latex: document.finalText ?? document.text,
      template: template.name,
      strict,
      stage: document.stage,
      examples: candidates.map(toExample),
      unresolvedPlaceholders,
      latencyMs
    };
  } catch (error) {
    const name = error instanceof Error ? error.name : "UnknownError";
    resolved.recordGenerationOutcome(name);
    resolved.logError("generation.pipeline.failed", context, {
      template: templateName,
      strict,
      error_name: name,
      error: error instanceof Error ? error.message : String(error)
    });
    throw error;
  }
};
