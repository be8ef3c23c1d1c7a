import { tidyWhitespace } from "./whitespace.js";
import { BODY_CLOSE_MARKER, BODY_OPEN_MARKER } from "./types.js";

const DOCUMENT_CLASS = /\\documentclass(?![a-zA-Z])/g;
const DOCUMENT_CLASS_INVOCATION = /^\\documentclass\s*(?:\[[^\]]*\])?\s*(?:\{[^{}]*\})?/;

export const indicesOf = (text: string, token: string): number[] => {
  const indices: number[] = [];
  for (let index = text.indexOf(token); index !== -1; index = text.indexOf(token, index + token.length)) {
    indices.push(index);
  }
  return indices;
};

const removeRanges = (text: string, ranges: ReadonlyArray<{ start: number; end: number }>): string =>
  [...ranges]
    .sort((a, b) => b.start - a.start)
    .reduce((current, range) => current.slice(0, range.start) + current.slice(range.end), text);

/**
 * Keeps the first preamble, the first `\begin{document}` and the last
 * `\end{document}`. Every later `\documentclass` goes together with the
 * preamble it starts.
 */
export const collapseDuplicatePreambles = (text: string): string => {
  const classes = [...text.matchAll(DOCUMENT_CLASS)].map((match) => match.index ?? 0);
  if (classes.length <= 1 && indicesOf(text, BODY_OPEN_MARKER).length <= 1) {
    return text;
  }

  // The first document's own `\begin{document}` is never part of a later preamble.
  const keptOpen = classes.length > 0 ? text.indexOf(BODY_OPEN_MARKER, classes[0]) : -1;
  const laterPreambles: Array<{ start: number; end: number }> = [];
  for (const start of classes.slice(1)) {
    const previous = laterPreambles[laterPreambles.length - 1];
    if (previous && start < previous.end) {
      continue;
    }
    const nextOpen = text.indexOf(BODY_OPEN_MARKER, start);
    if (nextOpen !== -1 && nextOpen !== keptOpen) {
      laterPreambles.push({ start, end: nextOpen + BODY_OPEN_MARKER.length });
      continue;
    }
    const invocation = DOCUMENT_CLASS_INVOCATION.exec(text.slice(start));
    laterPreambles.push({ start, end: start + (invocation ? invocation[0].length : "\\documentclass".length) });
  }

  let current = removeRanges(text, laterPreambles);

  current = removeRanges(
    current,
    indicesOf(current, BODY_OPEN_MARKER)
      .slice(1)
      .map((start) => ({ start, end: start + BODY_OPEN_MARKER.length }))
  );

  current = removeRanges(
    current,
    indicesOf(current, BODY_CLOSE_MARKER)
      .slice(0, -1)
      .map((start) => ({ start, end: start + BODY_CLOSE_MARKER.length }))
  );

  return tidyWhitespace(current);
};
