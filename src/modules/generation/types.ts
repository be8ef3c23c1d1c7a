import type { DocumentStage } from "../latex/types.js";
import type { DocumentSpec } from "./document-spec.js";

export type GenerationRequest = {
  /** Free-text request. Ignored when `documentSpec` is given. */
  prompt?: string;
  documentSpec?: DocumentSpec;
  templateName?: string;
  strict?: boolean;
  filter?: unknown;
  k?: number;
  placeholderValues?: Readonly<Record<string, string>>;
  requestId?: string;
};

export type GenerationExample = {
  id: string;
  documentType: string;
  similarityScore: number;
  metadataScore: number;
  combinedScore: number;
};

export type GenerationResult = {
  latex: string;
  template: string;
  strict: boolean;
  stage: DocumentStage;
  examples: GenerationExample[];
  unresolvedPlaceholders: string[];
  latencyMs: number;
};
