type OpenConstruct = { kind: "brace"; index: number } | { kind: "environment"; name: string; index: number };

interface StructureEdit {
  index: number;
  remove: number;
  insert: string;
}

export interface StructureIssue {
  kind: "unmatched-close" | "unclosed" | "nested-document";
  construct: string;
  index: number;
}

interface StructureScan {
  edits: StructureEdit[];
  issues: StructureIssue[];
}

const VERBATIM_ENVIRONMENTS = new Set(["verbatim", "verbatim*", "Verbatim", "lstlisting", "minted", "comment"]);
const ENVIRONMENT_NAME = /^[A-Za-z0-9@*:-]+$/;
const BEGIN_DOCUMENT = "\\begin{document}";
const END_DOCUMENT = "\\end{document}";

const describe = (construct: OpenConstruct): string =>
  construct.kind === "brace" ? "{" : `\\begin{${construct.name}}`;

const readTagName = (text: string, index: number, tag: "\\begin{" | "\\end{"): { name: string; end: number } | null => {
  if (!text.startsWith(tag, index)) {
    return null;
  }
  const nameStart = index + tag.length;
  const close = text.indexOf("}", nameStart);
  if (close === -1) {
    return null;
  }
  const name = text.slice(nameStart, close);
  return ENVIRONMENT_NAME.test(name) ? { name, end: close + 1 } : null;
};

/** Closing text for `constructs`, innermost first. Environment closes go on their own line. */
const renderCloses = (
  constructs: readonly OpenConstruct[],
  previousChar: string | undefined,
  beforeLineStartToken: boolean
): string => {
  let output = "";
  let last = previousChar;
  let lastWasEnvironment = false;
  for (const construct of constructs) {
    if (construct.kind === "brace") {
      output += "}";
      last = "}";
      lastWasEnvironment = false;
      continue;
    }
    const prefix = last === undefined || last === "\n" ? "" : "\n";
    output += `${prefix}\\end{${construct.name}}`;
    last = "}";
    lastWasEnvironment = true;
  }
  return beforeLineStartToken && lastWasEnvironment ? `${output}\n` : output;
};

const findLastOpen = (stack: readonly OpenConstruct[], matches: (construct: OpenConstruct) => boolean): number => {
  for (let index = stack.length - 1; index >= 0; index -= 1) {
    if (matches(stack[index])) {
      return index;
    }
  }
  return -1;
};

const isOpenDocument = (construct: OpenConstruct): boolean =>
  construct.kind === "environment" && construct.name === "document";

// An `\end{document}` followed by another one (with no new document opened in between) is stray.
const isSupersededDocumentEnd = (text: string, after: number): boolean => {
  const nextEnd = text.indexOf(END_DOCUMENT, after);
  if (nextEnd === -1) {
    return false;
  }
  const nextBegin = text.indexOf(BEGIN_DOCUMENT, after);
  return nextBegin === -1 || nextEnd < nextBegin;
};

const scanStructure = (text: string): StructureScan => {
  const stack: OpenConstruct[] = [];
  const edits: StructureEdit[] = [];
  const issues: StructureIssue[] = [];
  let commentReachesEnd = false;

  const deleteToken = (
    index: number,
    length: number,
    construct: string,
    kind: StructureIssue["kind"] = "unmatched-close"
  ): void => {
    edits.push({ index, remove: length, insert: "" });
    issues.push({ kind, construct, index });
  };

  const closeAbove = (target: number, index: number, beforeLineStartToken: boolean): void => {
    const above = stack.splice(target + 1).reverse();
    if (above.length === 0) {
      return;
    }
    edits.push({ index, remove: 0, insert: renderCloses(above, text[index - 1], beforeLineStartToken) });
    for (const construct of above) {
      issues.push({ kind: "unclosed", construct: describe(construct), index: construct.index });
    }
  };

  let i = 0;
  while (i < text.length) {
    const char = text[i];

    if (char === "%") {
      const lineEnd = text.indexOf("\n", i);
      if (lineEnd === -1) {
        commentReachesEnd = true;
        break;
      }
      i = lineEnd;
      continue;
    }

    if (char === "{") {
      stack.push({ kind: "brace", index: i });
      i += 1;
      continue;
    }

    if (char === "}") {
      const target = findLastOpen(stack, (construct) => construct.kind === "brace");
      if (target === -1) {
        deleteToken(i, 1, "}");
      } else {
        closeAbove(target, i, false);
        stack.pop();
      }
      i += 1;
      continue;
    }

    if (char !== "\\") {
      i += 1;
      continue;
    }

    const begin = readTagName(text, i, "\\begin{");
    if (begin) {
      if (VERBATIM_ENVIRONMENTS.has(begin.name)) {
        const endTag = `\\end{${begin.name}}`;
        const close = text.indexOf(endTag, begin.end);
        if (close === -1) {
          stack.push({ kind: "environment", name: begin.name, index: i });
          break;
        }
        i = close + endTag.length;
        continue;
      }
      // A document never opens inside another one; the outer one keeps the body.
      if (begin.name === "document" && findLastOpen(stack, isOpenDocument) !== -1) {
        deleteToken(i, begin.end - i, BEGIN_DOCUMENT, "nested-document");
        i = begin.end;
        continue;
      }
      stack.push({ kind: "environment", name: begin.name, index: i });
      i = begin.end;
      continue;
    }

    const end = readTagName(text, i, "\\end{");
    if (end) {
      const target = findLastOpen(
        stack,
        (construct) => construct.kind === "environment" && construct.name === end.name
      );
      if (target === -1 || (end.name === "document" && isSupersededDocumentEnd(text, end.end))) {
        deleteToken(i, end.end - i, `\\end{${end.name}}`);
      } else {
        closeAbove(target, i, true);
        stack.pop();
      }
      i = end.end;
      continue;
    }

    const verb = /^\\verb\*?([^a-zA-Z\s*])/.exec(text.slice(i, i + 8));
    if (verb) {
      const bodyStart = i + verb[0].length;
      const close = text.indexOf(verb[1], bodyStart);
      const lineEnd = text.indexOf("\n", bodyStart);
      if (close !== -1 && (lineEnd === -1 || close < lineEnd)) {
        i = close + 1;
        continue;
      }
    }

    // Escaped character or the first letter of a command word.
    i += 2;
  }

  if (stack.length > 0) {
    const open = [...stack].reverse();
    const previous = commentReachesEnd ? "%" : text[text.length - 1];
    const closes = renderCloses(open, previous, false);
    edits.push({ index: text.length, remove: 0, insert: commentReachesEnd && !closes.startsWith("\n") ? `\n${closes}` : closes });
    for (const construct of open) {
      issues.push({ kind: "unclosed", construct: describe(construct), index: construct.index });
    }
  }

  return { edits, issues };
};

const applyEdits = (text: string, edits: readonly StructureEdit[]): string =>
  [...edits]
    .sort((a, b) => b.index - a.index)
    .reduce((current, edit) => current.slice(0, edit.index) + edit.insert + current.slice(edit.index + edit.remove), text);

/**
 * Closes what was left open and drops closes that match nothing. An `\end{X}`
 * whose `X` is open first closes every construct opened after `X`. A
 * `\begin{document}` inside an open document is dropped.
 */
export const balanceStructure = (text: string): string => applyEdits(text, scanStructure(text).edits);

export const findStructureIssues = (text: string): StructureIssue[] => scanStructure(text).issues;
