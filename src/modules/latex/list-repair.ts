import { balanceStructure } from "./structure-balancer.js";

const LIST_BEGIN = /\\begin\{(?:itemize|enumerate|description)\}/g;
const LIST_END = /\\end\{(?:itemize|enumerate|description)\}/g;
const VERBATIM_BEGIN = /\\begin\{(?:verbatim\*?|Verbatim|lstlisting|minted|comment)\}/;
const VERBATIM_END = /\\end\{(?:verbatim\*?|Verbatim|lstlisting|minted|comment)\}/;

const UNORDERED_BULLET = /^(\s*)[-*•]\s+(\S.*)$/;
const ORDERED_BULLET = /^(\s*)\d{1,2}[.)]\s+(\S.*)$/;

const MISSING_FIRST_ITEM =
  /(\\begin\{(?:itemize|enumerate|description)\}(?:\[[^\]\n]*\])?)(\s*)(?=\S)(?!\\item(?![a-zA-Z])|\\end\{|%|\\(?:setlength|addtolength|itemsep|label)(?![a-zA-Z]))/g;

const EMPTY_LIST = /\\begin\{(itemize|enumerate|description)\}(?:\[[^\]\n]*\])?\s*\\end\{\1\}/g;

type BulletKind = "itemize" | "enumerate";

const countMatches = (line: string, pattern: RegExp): number => line.match(pattern)?.length ?? 0;

const bulletOf = (line: string): { kind: BulletKind; indent: string; content: string } | null => {
  const unordered = UNORDERED_BULLET.exec(line);
  if (unordered) {
    return { kind: "itemize", indent: unordered[1], content: unordered[2] };
  }
  const ordered = ORDERED_BULLET.exec(line);
  if (ordered) {
    return { kind: "enumerate", indent: ordered[1], content: ordered[2] };
  }
  return null;
};

/**
 * Markdown bullets become `\item`s: inside a list in place, outside a list
 * wrapped in a new `itemize` (or `enumerate` for numbered runs).
 */
export const convertBullets = (text: string): string => {
  const output: string[] = [];
  let pending: { kind: BulletKind; items: string[] } | null = null;
  let listDepth = 0;
  let inVerbatim = false;

  const flush = (): void => {
    if (!pending) {
      return;
    }
    output.push(`\\begin{${pending.kind}}`, ...pending.items.map((item) => `\\item ${item}`), `\\end{${pending.kind}}`);
    pending = null;
  };

  for (const line of text.split("\n")) {
    const bullet = inVerbatim ? null : bulletOf(line);

    if (bullet && listDepth > 0) {
      output.push(`${bullet.indent}\\item ${bullet.content}`);
    } else if (bullet) {
      if (pending && pending.kind !== bullet.kind) {
        flush();
      }
      pending = pending ?? { kind: bullet.kind, items: [] };
      pending.items.push(bullet.content);
    } else {
      flush();
      output.push(line);
    }

    if (inVerbatim) {
      inVerbatim = !VERBATIM_END.test(line);
      continue;
    }
    inVerbatim = VERBATIM_BEGIN.test(line) && !VERBATIM_END.test(line);
    listDepth = Math.max(0, listDepth + countMatches(line, LIST_BEGIN) - countMatches(line, LIST_END));
  }
  flush();

  return output.join("\n");
};

export const insertMissingFirstItem = (text: string): string => text.replace(MISSING_FIRST_ITEM, "$1$2\\item ");

export const removeEmptyLists = (text: string): string => {
  let current = text;
  for (;;) {
    const next = current.replace(EMPTY_LIST, "");
    if (next === current) {
      return current;
    }
    current = next;
  }
};

/**
 * Bullets become lists before the structure scan, so closes the scan appends
 * for an open group land outside the new list rather than inside an item.
 */
export const repairLists = (text: string): string =>
  removeEmptyLists(insertMissingFirstItem(balanceStructure(convertBullets(text))));
