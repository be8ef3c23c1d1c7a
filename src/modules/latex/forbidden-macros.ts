import { tidyWhitespace } from "./whitespace.js";

export const DEFAULT_FORBIDDEN_MACROS: readonly string[] = Object.freeze([
  "newcommand",
  "renewcommand",
  "providecommand",
  "def",
  "gdef",
  "edef",
  "xdef",
  "let",
  "newenvironment",
  "renewenvironment",
  "DeclareRobustCommand",
  "catcode",
  "write",
  "immediate",
  "openout",
  "openin",
  "input",
  "include"
]);

interface MacroShape {
  /** Brace groups the invocation owns. A leading control-sequence name counts as one. */
  groups: number;
  controlSequences: number;
  takesFileName: boolean;
}

const DEFAULT_SHAPE: MacroShape = { groups: 1, controlSequences: 2, takesFileName: false };

const MACRO_SHAPES: Readonly<Record<string, MacroShape>> = {
  newcommand: { groups: 2, controlSequences: 1, takesFileName: false },
  renewcommand: { groups: 2, controlSequences: 1, takesFileName: false },
  providecommand: { groups: 2, controlSequences: 1, takesFileName: false },
  DeclareRobustCommand: { groups: 2, controlSequences: 1, takesFileName: false },
  newenvironment: { groups: 3, controlSequences: 0, takesFileName: false },
  renewenvironment: { groups: 3, controlSequences: 0, takesFileName: false },
  def: { groups: 2, controlSequences: 1, takesFileName: false },
  gdef: { groups: 2, controlSequences: 1, takesFileName: false },
  edef: { groups: 2, controlSequences: 1, takesFileName: false },
  xdef: { groups: 2, controlSequences: 1, takesFileName: false },
  let: { groups: 2, controlSequences: 2, takesFileName: false },
  catcode: { groups: 0, controlSequences: 0, takesFileName: false },
  write: { groups: 2, controlSequences: 1, takesFileName: false },
  // A prefix: the command it modifies is removed on its own.
  immediate: { groups: 0, controlSequences: 0, takesFileName: false },
  openout: { groups: 1, controlSequences: 1, takesFileName: true },
  openin: { groups: 1, controlSequences: 1, takesFileName: true },
  input: { groups: 1, controlSequences: 0, takesFileName: true },
  include: { groups: 1, controlSequences: 0, takesFileName: true }
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const normalizeMacroNames = (macros: readonly string[]): string[] =>
  [...new Set(macros.map((macro) => macro.trim().replace(/^\\/, "")).filter((macro) => macro.length > 0))].sort(
    (a, b) => b.length - a.length
  );

const buildInvocationPattern = (macros: readonly string[]): RegExp | null => {
  const names = normalizeMacroNames(macros);
  if (names.length === 0) {
    return null;
  }
  return new RegExp(`\\\\(${names.map(escapeRegExp).join("|")})(?![a-zA-Z])`, "g");
};

const precedingBackslashes = (text: string, index: number): number => {
  let count = 0;
  for (let i = index - 1; i >= 0 && text[i] === "\\"; i -= 1) {
    count += 1;
  }
  return count;
};

/** Index just past the group opened at `start`, or the end of its line when it never closes. */
export const findGroupEnd = (text: string, start: number, open = "{", close = "}"): number => {
  let depth = 0;
  for (let i = start; i < text.length; i += 1) {
    const char = text[i];
    if (char === "\\") {
      i += 1;
      continue;
    }
    if (char === open) {
      depth += 1;
    } else if (char === close) {
      depth -= 1;
      if (depth === 0) {
        return i + 1;
      }
    }
  }
  const lineEnd = text.indexOf("\n", start);
  return lineEnd === -1 ? text.length : lineEnd;
};

const skipInlineSpaces = (text: string, index: number): number => {
  let cursor = index;
  while (text[cursor] === " " || text[cursor] === "\t") {
    cursor += 1;
  }
  return cursor;
};

const consumeArguments = (text: string, start: number, shape: MacroShape): number => {
  let end = start;
  let args = 0;
  let braceGroups = 0;
  let controlSequences = 0;

  for (;;) {
    const cursor = skipInlineSpaces(text, end);
    const char = text[cursor];
    const rest = text.slice(cursor, cursor + 64);

    if (char === "{" && args < shape.groups) {
      end = findGroupEnd(text, cursor);
      args += 1;
      braceGroups += 1;
      continue;
    }
    if (char === "[" && args < shape.groups) {
      const close = text.indexOf("]", cursor);
      const lineEnd = text.indexOf("\n", cursor);
      if (close === -1 || (lineEnd !== -1 && lineEnd < close)) {
        break;
      }
      end = close + 1;
      continue;
    }
    if (braceGroups > 0) {
      break;
    }
    if (char === "\\" && controlSequences < shape.controlSequences && args < shape.groups) {
      const name = /^\\(?:[a-zA-Z@]+|[^a-zA-Z@\s])/.exec(rest);
      if (!name) {
        break;
      }
      end = cursor + name[0].length;
      controlSequences += 1;
      args += 1;
      continue;
    }
    // Star forms, parameter text, assignments, stream numbers and catcode characters.
    const parameter = /^(?:\*|#\d|=|\d+|`\\?.)/.exec(rest);
    if (parameter) {
      end = cursor + parameter[0].length;
      continue;
    }
    if (shape.takesFileName) {
      const fileName = /^[^\s{}\\%]+/.exec(rest);
      if (fileName) {
        end = cursor + fileName[0].length;
      }
    }
    break;
  }

  return end;
};

interface Invocation {
  name: string;
  start: number;
  end: number;
}

const findInvocations = (text: string, macros: readonly string[]): Invocation[] => {
  const pattern = buildInvocationPattern(macros);
  if (!pattern) {
    return [];
  }

  const invocations: Invocation[] = [];
  for (const match of text.matchAll(pattern)) {
    const start = match.index ?? 0;
    // `\\def` is a line break followed by text.
    if (precedingBackslashes(text, start) % 2 === 1) {
      continue;
    }
    const name = match[1];
    const shape = Object.hasOwn(MACRO_SHAPES, name) ? MACRO_SHAPES[name] : DEFAULT_SHAPE;
    invocations.push({ name, start, end: consumeArguments(text, start + match[0].length, shape) });
  }
  return invocations;
};

export const findForbiddenMacros = (
  text: string,
  macros: readonly string[] = DEFAULT_FORBIDDEN_MACROS
): string[] => [...new Set(findInvocations(text, macros).map((invocation) => invocation.name))];

export const removeForbiddenMacros = (
  text: string,
  macros: readonly string[] = DEFAULT_FORBIDDEN_MACROS
): string => {
  let current = text;
  for (;;) {
    const [first] = findInvocations(current, macros);
    if (!first) {
      break;
    }
    current = current.slice(0, first.start) + current.slice(first.end);
  }
  return tidyWhitespace(current);
};
