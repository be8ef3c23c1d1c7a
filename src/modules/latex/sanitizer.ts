import { stripArtifacts } from "./artifacts.js";
import { applyCorrections } from "./corrections.js";
import { collapseDuplicatePreambles } from "./duplicate-preambles.js";
import { DEFAULT_FORBIDDEN_MACROS, removeForbiddenMacros } from "./forbidden-macros.js";
import { repairLists } from "./list-repair.js";
import type { SanitizeOptions } from "./types.js";
import { tidyWhitespace } from "./whitespace.js";

interface StageContext {
  forbiddenMacros: readonly string[];
}

export interface SanitizerStage {
  name: string;
  strictOnly: boolean;
  apply: (text: string, context: StageContext) => string;
}

export const SANITIZER_STAGES: readonly SanitizerStage[] = Object.freeze([
  {
    name: "strip-artifacts",
    strictOnly: false,
    apply: (text, context) => stripArtifacts(text, context.forbiddenMacros)
  },
  {
    name: "normalize-backslashes",
    strictOnly: false,
    apply: (text) => applyCorrections(text)
  },
  {
    name: "normalize-whitespace",
    strictOnly: false,
    apply: (text) => tidyWhitespace(text)
  },
  {
    name: "remove-forbidden-macros",
    strictOnly: false,
    apply: (text, context) => removeForbiddenMacros(text, context.forbiddenMacros)
  },
  {
    name: "repair-structure",
    strictOnly: false,
    apply: (text) => tidyWhitespace(repairLists(text))
  },
  {
    name: "collapse-duplicate-preambles",
    strictOnly: true,
    apply: (text) => collapseDuplicatePreambles(text)
  }
]);

const MAX_PASSES = 8;

const runStages = (text: string, context: StageContext, strict: boolean): string =>
  SANITIZER_STAGES.reduce(
    (current, stage) => (stage.strictOnly && !strict ? current : stage.apply(current, context)),
    text
  );

/**
 * Turns raw model output into LaTeX the template enforcer can work with.
 * Never throws; running it on its own output changes nothing.
 *
 * A later stage can leave text an earlier one rewrites (a removed macro
 * exposing an eaten `\noindent` at a line start), so the stage sequence is
 * repeated until a pass changes nothing.
 */
export const sanitize = (raw: string, options: SanitizeOptions = {}): string => {
  const context: StageContext = {
    forbiddenMacros: options.forbiddenMacros ?? DEFAULT_FORBIDDEN_MACROS
  };
  const strict = options.strict ?? false;

  let current = runStages(raw, context, strict);
  for (let pass = 1; pass < MAX_PASSES; pass += 1) {
    const next = runStages(current, context, strict);
    if (next === current) {
      break;
    }
    current = next;
  }
  return current;
};
