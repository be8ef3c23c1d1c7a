import Fastify, { type FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { registerGenerateRoutes } from "../../src/api/routes/generate.js";
import { CompletionProviderError, InvalidGenerationRequestError } from "../../src/modules/generation/errors.js";
import type { generate } from "../../src/modules/generation/generation-pipeline.js";
import type { GenerationResult } from "../../src/modules/generation/types.js";
import {
  StrictValidationError,
  UnknownTemplateError,
  UnresolvedPlaceholderError
} from "../../src/modules/latex/errors.js";
import { EmptyIndexError, InvalidFilterError, RetrieverHealthError } from "../../src/modules/rag/errors.js";
import { getMetricsSnapshot, resetMetrics } from "../../src/observability/metrics.js";

const RESULT: GenerationResult = {
  latex: "\\documentclass{article}\n\\begin{document}\nBody\n\\end{document}\n",
  template: "article_minimal",
  strict: false,
  stage: "final",
  examples: [{ id: "ex-7", documentType: "assignment", similarityScore: 0.25, metadataScore: 1, combinedScore: 0.625 }],
  unresolvedPlaceholders: [],
  latencyMs: 42
};

describe("registerGenerateRoutes", () => {
  let app: FastifyInstance;

  beforeEach(() => {
    resetMetrics();
    app = Fastify();
  });

  afterEach(async () => {
    await app.close();
  });

  const setup = async (run: Mock<typeof generate>) => {
    await registerGenerateRoutes(app, { generate: run });
    return run;
  };

  it("maps the request and returns the generated document", async () => {
    const run = await setup(vi.fn<typeof generate>().mockResolvedValue(RESULT));

    const response = await app.inject({
      method: "POST",
      url: "/generate",
      headers: { "x-request-id": "req-1" },
      payload: {
        prompt: "Write homework",
        template: "assignment",
        strict: true,
        filter: { keywords: ["math"] },
        k: 2,
        placeholders: { COURSE: "MATH 101" }
      }
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      latex: RESULT.latex,
      template: "article_minimal",
      strict: false,
      stage: "final",
      examples: [{ id: "ex-7", document_type: "assignment", similarity_score: 0.25, metadata_score: 1, combined_score: 0.625 }],
      unresolved_placeholders: [],
      latency_ms: 42
    });
    expect(run).toHaveBeenCalledWith({
      prompt: "Write homework",
      documentSpec: undefined,
      templateName: "assignment",
      strict: true,
      filter: { keywords: ["math"] },
      k: 2,
      placeholderValues: { COURSE: "MATH 101" },
      requestId: "req-1"
    });
  });

  it("accepts a document spec instead of a prompt", async () => {
    const run = await setup(vi.fn<typeof generate>().mockResolvedValue(RESULT));

    const response = await app.inject({
      method: "POST",
      url: "/generate",
      payload: { document_spec: { document_type: "report", sections: [{ title: "Intro" }] } }
    });

    expect(response.statusCode).toBe(200);
    expect(run.mock.calls[0][0].documentSpec).toEqual({
      document_type: "report",
      sections: [{ title: "Intro" }]
    });
  });

  it("rejects a body without prompt or document spec", async () => {
    const run = await setup(vi.fn<typeof generate>());

    const response = await app.inject({ method: "POST", url: "/generate", payload: {} });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      detail: [{ type: "custom", loc: ["body", "prompt"], msg: "prompt or document_spec is required" }]
    });
    expect(run).not.toHaveBeenCalled();
    expect(getMetricsSnapshot().error_rates).toEqual({ validation_422: 1 });
  });

  it("rejects unknown fields and invalid k", async () => {
    await setup(vi.fn<typeof generate>());

    const unknownField = await app.inject({ method: "POST", url: "/generate", payload: { prompt: "x", temperature: 1 } });
    const badK = await app.inject({ method: "POST", url: "/generate", payload: { prompt: "x", k: 0 } });

    expect(unknownField.statusCode).toBe(422);
    expect(unknownField.json().detail[0]).toMatchObject({ type: "unrecognized_keys", loc: ["body"] });
    expect(badK.statusCode).toBe(422);
    expect(badK.json().detail[0]).toEqual({ type: "too_small", loc: ["body", "k"], msg: "k must be positive" });
  });

  it.each([
    [
      new InvalidFilterError(["filter.keywords.0: Expected string, received number"]),
      422,
      "filter_422",
      {
        detail: [
          { type: "invalid_filter", loc: ["body", "filter"], msg: "filter.keywords.0: Expected string, received number" }
        ]
      }
    ],
    [
      new InvalidGenerationRequestError(["prompt: either prompt or documentSpec is required"]),
      422,
      "validation_422",
      { detail: [{ type: "invalid_request", loc: ["body"], msg: "prompt: either prompt or documentSpec is required" }] }
    ],
    [
      new UnknownTemplateError("nope", ["article_minimal"]),
      422,
      "template_422",
      {
        detail: [
          {
            type: "unknown_template",
            loc: ["body", "template"],
            msg: 'Unknown template "nope". Registered templates: article_minimal.'
          }
        ]
      }
    ],
    [
      new UnresolvedPlaceholderError(["COURSE"], "wrapped"),
      422,
      "placeholder_422",
      {
        detail: [{ type: "unresolved_placeholder", loc: ["body", "placeholders"], msg: "Unresolved placeholders: {{COURSE}}" }],
        placeholders: ["COURSE"],
        stage: "wrapped"
      }
    ],
    [
      new StrictValidationError("empty-body", "document body is empty", "placeholders_filled"),
      422,
      "strict_422",
      {
        detail: [
          { type: "strict_validation", loc: ["body"], msg: "Strict validation failed (empty-body): document body is empty" }
        ],
        rule: "empty-body",
        stage: "placeholders_filled"
      }
    ],
    [new EmptyIndexError(), 503, "empty_index_503", { detail: "The similarity index holds no entries." }],
    [
      new RetrieverHealthError("Vector store health error: down"),
      503,
      "infrastructure_503",
      { detail: "Vector store health error: down" }
    ],
    [
      new CompletionProviderError("Model call failed: timeout"),
      503,
      "infrastructure_503",
      { detail: "Model call failed: timeout" }
    ],
    [new Error("boom"), 500, "generate_500", { detail: "Internal server error" }]
  ])("maps %s to its response", async (error, statusCode, metric, body) => {
    await setup(vi.fn<typeof generate>().mockRejectedValue(error));

    const response = await app.inject({ method: "POST", url: "/generate", payload: { prompt: "x" } });

    expect(response.statusCode).toBe(statusCode);
    expect(response.json()).toEqual(body);
    expect(getMetricsSnapshot().error_rates).toEqual({ [metric]: 1 });
  });
});
