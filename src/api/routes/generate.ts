import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { documentSpecSchema } from "../../modules/generation/document-spec.js";
import { CompletionProviderError, InvalidGenerationRequestError } from "../../modules/generation/errors.js";
import { generate } from "../../modules/generation/generation-pipeline.js";
import {
  StrictValidationError,
  UnknownTemplateError,
  UnresolvedPlaceholderError
} from "../../modules/latex/errors.js";
import { EmptyIndexError, InvalidFilterError, RetrieverHealthError } from "../../modules/rag/errors.js";
import { recordErrorRate } from "../../observability/metrics.js";

const generateBodySchema = z
  .object({
    prompt: z.string().trim().min(1, "prompt must not be blank").optional(),
    document_spec: documentSpecSchema.optional(),
    template: z.string().trim().min(1, "template must not be blank").optional(),
    strict: z.boolean().optional(),
    filter: z.unknown().optional(),
    k: z.number().int("k must be an integer").positive("k must be positive").optional(),
    placeholders: z.record(z.string()).optional()
  })
  .strict()
  .refine((body) => body.prompt !== undefined || body.document_spec !== undefined, {
    message: "prompt or document_spec is required",
    path: ["prompt"]
  });

type ValidationIssue = { type: string; loc: Array<string | number>; msg: string };

const toValidationError = (error: z.ZodError): { detail: ValidationIssue[] } => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

export interface ErrorResponse {
  statusCode: number;
  metric: string;
  body: Record<string, unknown>;
}

const unprocessable = (metric: string, issue: ValidationIssue, extra: Record<string, unknown> = {}): ErrorResponse => ({
  statusCode: 422,
  metric,
  body: { detail: [issue], ...extra }
});

export const toErrorResponse = (error: unknown): ErrorResponse => {
  if (error instanceof InvalidFilterError) {
    return {
      statusCode: 422,
      metric: "filter_422",
      body: { detail: error.issues.map((msg) => ({ type: "invalid_filter", loc: ["body", "filter"], msg })) }
    };
  }
  if (error instanceof InvalidGenerationRequestError) {
    return {
      statusCode: 422,
      metric: "validation_422",
      body: { detail: error.issues.map((msg) => ({ type: "invalid_request", loc: ["body"], msg })) }
    };
  }
  if (error instanceof UnknownTemplateError) {
    return unprocessable("template_422", { type: "unknown_template", loc: ["body", "template"], msg: error.message });
  }
  if (error instanceof UnresolvedPlaceholderError) {
    return unprocessable(
      "placeholder_422",
      { type: "unresolved_placeholder", loc: ["body", "placeholders"], msg: error.message },
      { placeholders: error.placeholders, stage: error.stage }
    );
  }
  if (error instanceof StrictValidationError) {
    return unprocessable(
      "strict_422",
      { type: "strict_validation", loc: ["body"], msg: error.message },
      { rule: error.rule, stage: error.stage }
    );
  }
  if (error instanceof EmptyIndexError) {
    return { statusCode: 503, metric: "empty_index_503", body: { detail: error.message } };
  }
  if (error instanceof RetrieverHealthError || error instanceof CompletionProviderError) {
    return { statusCode: 503, metric: "infrastructure_503", body: { detail: error.message } };
  }
  return { statusCode: 500, metric: "generate_500", body: { detail: "Internal server error" } };
};

export interface GenerateRoutesDependencies {
  generate?: typeof generate;
}

const buildGenerateHandler = (dependencies?: GenerateRoutesDependencies) => {
  const runGeneration = dependencies?.generate ?? generate;

  return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const parsed = generateBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422).send(toValidationError(parsed.error));
      return;
    }

    const body = parsed.data;
    try {
      const result = await runGeneration({
        prompt: body.prompt,
        documentSpec: body.document_spec,
        templateName: body.template,
        strict: body.strict,
        filter: body.filter,
        k: body.k,
        placeholderValues: body.placeholders,
        requestId: resolveRequestId(request)
      });

      reply.code(200).send({
        latex: result.latex,
        template: result.template,
        strict: result.strict,
        stage: result.stage,
        examples: result.examples.map((example) => ({
          id: example.id,
          document_type: example.documentType,
          similarity_score: example.similarityScore,
          metadata_score: example.metadataScore,
          combined_score: example.combinedScore
        })),
        unresolved_placeholders: result.unresolvedPlaceholders,
        latency_ms: result.latencyMs
      });
    } catch (error) {
      const response = toErrorResponse(error);
      recordErrorRate(response.metric);
      if (response.statusCode >= 500) {
        request.log.error({ err: error }, "generation failed");
      }
      reply.code(response.statusCode).send(response.body);
    }
  };
};

export async function registerGenerateRoutes(app: FastifyInstance, dependencies?: GenerateRoutesDependencies): Promise<void> {
  app.post("/generate", buildGenerateHandler(dependencies));
}
