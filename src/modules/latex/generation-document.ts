import { randomUUID } from "node:crypto";
import { DocumentStageError } from "./errors.js";
import { DOCUMENT_STAGES, type DocumentStage } from "./types.js";

/**
 * One request's text as it moves through sanitizing and template enforcement.
 * Stages only move forward; `validated` exists in strict mode only.
 */
export class GenerationDocument {
  /** Correlates log entries for this document. */
  readonly id: string;
  readonly rawText: string;
  readonly strictMode: boolean;
  private currentStage: DocumentStage = "raw";
  private sanitized: string | null = null;
  private bodyText: string | null = null;
  private working: string;
  private unresolved: string[] = [];

  constructor(rawText: string, strictMode: boolean, id: string = randomUUID()) {
    this.id = id;
    this.rawText = rawText;
    this.strictMode = strictMode;
    this.working = rawText;
  }

  get stage(): DocumentStage {
    return this.currentStage;
  }

  /** Text at the current stage. */
  get text(): string {
    return this.working;
  }

  get sanitizedText(): string | null {
    return this.sanitized;
  }

  get body(): string | null {
    return this.bodyText;
  }

  get finalText(): string | null {
    return this.currentStage === "final" ? this.working : null;
  }

  get unresolvedPlaceholders(): readonly string[] {
    return this.unresolved;
  }

  markSanitized(text: string): void {
    this.advance("sanitized");
    this.sanitized = text;
    this.working = text;
  }

  markDePreambled(body: string): void {
    this.advance("de_preambled");
    this.bodyText = body;
    this.working = body;
  }

  markWrapped(text: string): void {
    this.advance("wrapped");
    this.working = text;
  }

  markPlaceholdersFilled(text: string, unresolved: readonly string[]): void {
    this.advance("placeholders_filled");
    this.working = text;
    this.unresolved = [...unresolved];
  }

  markValidated(): void {
    this.advance("validated");
  }

  markFinal(): void {
    this.advance("final");
  }

  private nextStage(): DocumentStage | null {
    const index = DOCUMENT_STAGES.indexOf(this.currentStage);
    const next = DOCUMENT_STAGES[index + 1];
    if (next === "validated" && !this.strictMode) {
      return DOCUMENT_STAGES[index + 2] ?? null;
    }
    return next ?? null;
  }

  private advance(to: DocumentStage): void {
    if (this.nextStage() !== to) {
      throw new DocumentStageError(this.currentStage, to);
    }
    this.currentStage = to;
  }
}
