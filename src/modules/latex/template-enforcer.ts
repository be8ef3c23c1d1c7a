import { StrictValidationError, UnresolvedPlaceholderError } from "./errors.js";
import { DEFAULT_FORBIDDEN_MACROS, findForbiddenMacros } from "./forbidden-macros.js";
import type { GenerationDocument } from "./generation-document.js";
import { indicesOf } from "./duplicate-preambles.js";
import { DEFAULT_PLACEHOLDER_VALUES, fillPlaceholders, type PlaceholderValues } from "./placeholders.js";
import { findStructureIssues } from "./structure-balancer.js";
import { getTemplate } from "./templates.js";
import { BODY_CLOSE_MARKER, BODY_OPEN_MARKER, type Template } from "./types.js";

const PREAMBLE_ONLY_COMMAND =
  /\\(?:documentclass|usepackage|RequirePackage)(?![a-zA-Z])\s*(?:\[[^\]]*\])?\s*(?:\{[^{}]*\})?[ \t]*\n?/g;

export interface EnforceTemplateOptions {
  templateName: string;
  placeholderValues?: PlaceholderValues;
  /** Values used when the request gives none. Inserted without escaping. */
  defaults?: Readonly<Record<string, string>>;
  forbiddenMacros?: readonly string[];
}

/** Body text between the first `\begin{document}` and the last `\end{document}`. */
export const stripPreamble = (text: string): string => {
  let body = text;
  const open = body.indexOf(BODY_OPEN_MARKER);
  if (open !== -1) {
    body = body.slice(open + BODY_OPEN_MARKER.length);
  }
  const close = body.lastIndexOf(BODY_CLOSE_MARKER);
  if (close !== -1) {
    body = body.slice(0, close);
  }
  return body.replace(PREAMBLE_ONLY_COMMAND, "").trim();
};

export const wrapBody = (template: Template, body: string): string => {
  const opening = template.bodyPrefix ? `${template.bodyOpenMarker}\n${template.bodyPrefix}` : template.bodyOpenMarker;
  return `${template.preambleText.trimEnd()}\n${opening}\n${body}\n${template.bodyCloseMarker}\n`;
};

const bodyBetweenMarkers = (text: string): string => {
  const open = text.indexOf(BODY_OPEN_MARKER);
  const close = text.lastIndexOf(BODY_CLOSE_MARKER);
  if (open === -1 || close === -1 || close < open) {
    return "";
  }
  return text.slice(open + BODY_OPEN_MARKER.length, close);
};

/**
 * Strict-mode checks on a filled document, first failure wins. Nothing is
 * repaired here.
 */
export const validateStrict = (
  text: string,
  template: Template,
  forbiddenMacros: readonly string[] = DEFAULT_FORBIDDEN_MACROS
): void => {
  const stage = "placeholders_filled";

  const opens = indicesOf(text, BODY_OPEN_MARKER).length;
  if (opens !== 1) {
    throw new StrictValidationError("single-begin-document", `expected 1 ${BODY_OPEN_MARKER}, found ${opens}`, stage);
  }
  const closes = indicesOf(text, BODY_CLOSE_MARKER).length;
  if (closes !== 1) {
    throw new StrictValidationError("single-end-document", `expected 1 ${BODY_CLOSE_MARKER}, found ${closes}`, stage);
  }

  const forbidden = findForbiddenMacros(text, forbiddenMacros);
  if (forbidden.length > 0) {
    throw new StrictValidationError(
      "forbidden-macro",
      `found ${forbidden.map((name) => `\\${name}`).join(", ")}`,
      stage
    );
  }

  const body = bodyBetweenMarkers(text).replace(template.bodyPrefix, "");
  if (body.trim() === "") {
    throw new StrictValidationError("empty-body", "document body is empty", stage);
  }

  const [issue] = findStructureIssues(text);
  if (issue) {
    throw new StrictValidationError(
      "balanced-structure",
      `${issue.kind} ${issue.construct} at offset ${issue.index}`,
      stage
    );
  }
};

/**
 * Moves a sanitized document through DePreamble, Wrap, FillPlaceholders and,
 * in strict mode, Validate. Strict failures leave the document at the stage
 * they were raised from.
 */
export const enforceTemplate = (document: GenerationDocument, options: EnforceTemplateOptions): Template => {
  const sanitized = document.sanitizedText ?? document.text;
  const template = getTemplate(options.templateName);

  document.markDePreambled(stripPreamble(sanitized));
  document.markWrapped(wrapBody(template, document.body ?? ""));

  const filled = fillPlaceholders(
    document.text,
    template.placeholders,
    options.placeholderValues ?? {},
    options.defaults ?? DEFAULT_PLACEHOLDER_VALUES
  );
  if (document.strictMode && filled.unresolved.length > 0) {
    throw new UnresolvedPlaceholderError(filled.unresolved, document.stage);
  }
  document.markPlaceholdersFilled(filled.text, filled.unresolved);

  if (document.strictMode) {
    validateStrict(document.text, template, options.forbiddenMacros ?? DEFAULT_FORBIDDEN_MACROS);
    document.markValidated();
  }
  document.markFinal();

  return template;
};
