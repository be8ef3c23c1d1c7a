export const DOCUMENT_STAGES = [
  "raw",
  "sanitized",
  "de_preambled",
  "wrapped",
  "placeholders_filled",
  "validated",
  "final"
] as const;

export type DocumentStage = (typeof DOCUMENT_STAGES)[number];

export const BODY_OPEN_MARKER = "\\begin{document}";
export const BODY_CLOSE_MARKER = "\\end{document}";

export type Template = {
  readonly name: string;
  readonly description: string;
  readonly preambleText: string;
  /** Emitted right after the open marker, before the body. */
  readonly bodyPrefix: string;
  readonly bodyOpenMarker: typeof BODY_OPEN_MARKER;
  readonly bodyCloseMarker: typeof BODY_CLOSE_MARKER;
  readonly placeholders: ReadonlySet<string>;
};

export type StrictRule =
  | "single-begin-document"
  | "single-end-document"
  | "forbidden-macro"
  | "empty-body"
  | "balanced-structure";

export interface SanitizeOptions {
  strict?: boolean;
  forbiddenMacros?: readonly string[];
}
