import type { DocumentStage, StrictRule } from "./types.js";

export class UnknownTemplateError extends Error {
  readonly templateName: string;

  constructor(templateName: string, available: readonly string[]) {
    super(`Unknown template "${templateName}". Registered templates: ${available.join(", ")}.`);
    this.name = "UnknownTemplateError";
    this.templateName = templateName;
  }
}

export class UnresolvedPlaceholderError extends Error {
  readonly placeholders: string[];
  readonly stage: DocumentStage;

  constructor(placeholders: string[], stage: DocumentStage) {
    super(`Unresolved placeholders: ${placeholders.map((name) => `{{${name}}}`).join(", ")}`);
    this.name = "UnresolvedPlaceholderError";
    this.placeholders = placeholders;
    this.stage = stage;
  }
}

export class StrictValidationError extends Error {
  readonly rule: StrictRule;
  readonly stage: DocumentStage;

  constructor(rule: StrictRule, detail: string, stage: DocumentStage) {
    super(`Strict validation failed (${rule}): ${detail}`);
    this.name = "StrictValidationError";
    this.rule = rule;
    this.stage = stage;
  }
}

export class DocumentStageError extends Error {
  readonly from: DocumentStage;
  readonly to: DocumentStage;

  constructor(from: DocumentStage, to: DocumentStage) {
    super(`Illegal document stage transition: ${from} -> ${to}`);
    this.name = "DocumentStageError";
    this.from = from;
    this.to = to;
  }
}
