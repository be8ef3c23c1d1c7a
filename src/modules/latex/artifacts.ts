import { removeForbiddenMacros } from "./forbidden-macros.js";
import { normalizeLineEndings } from "./whitespace.js";

// Trace dumps some local model clients append after the completion text.
const CLIENT_TRACE_PATTERNS = [/'\s*thinking=[\s\S]*$/, /\n?logprobs=[\s\S]*$/, /context=\[[\s\S]*\]\s*$/];

const ESCAPED_NEWLINE = /(?<!\\)\\n(?![a-zA-Z])/g;
const FENCE_LINE = /^[ \t]*```.*$/gm;
const END_DOCUMENT = "\\end{document}";
const DOCUMENT_CLASS = /\\documentclass(?![a-zA-Z])/;
const CONTROL_WORD = /\\[a-zA-Z]/;

const LEADING_COMMENTARY =
  /^(?:sure|certainly|of course|absolutely|okay|ok|alright|great|here(?:'|’)?s|here is|here are|below is|below are|the following)\b/i;
const TRAILING_COMMENTARY =
  /^(?:let me know|i hope|hope this|this (?:document|latex|code|template|will)|feel free|note:|note that|you can|if you|the above|explanation|in this (?:document|example|code))\b/i;

const MARKDOWN_HEADING = /^(#{1,3})[ \t]+(.+?)[ \t]*#*[ \t]*$/gm;
const MARKDOWN_BOLD = /\*\*([^*\n]+?)\*\*/g;
const HEADING_COMMANDS = ["section", "subsection", "subsubsection"];

type LineVerdict = "blank" | "commentary" | "content";

// Lines are judged as they will look once forbidden macros are gone.
const classifyLine = (line: string, pattern: RegExp, forbiddenMacros: readonly string[]): LineVerdict => {
  const judged = removeForbiddenMacros(line, forbiddenMacros);
  if (judged.length === 0) {
    return "blank";
  }
  if (CONTROL_WORD.test(judged)) {
    return "content";
  }
  return pattern.test(judged) ? "commentary" : "content";
};

export const stripCommentary = (text: string, forbiddenMacros: readonly string[]): string => {
  const lines = text.split("\n");

  let start = 0;
  for (let i = 0; i < lines.length; i += 1) {
    const verdict = classifyLine(lines[i], LEADING_COMMENTARY, forbiddenMacros);
    if (verdict === "content") {
      break;
    }
    if (verdict === "commentary") {
      start = i + 1;
    }
  }

  let end = lines.length;
  for (let i = lines.length - 1; i >= start; i -= 1) {
    const verdict = classifyLine(lines[i], TRAILING_COMMENTARY, forbiddenMacros);
    if (verdict === "content") {
      break;
    }
    if (verdict === "commentary") {
      end = i;
    }
  }

  return lines.slice(start, end).join("\n");
};

const cutAfterLastDocumentEnd = (text: string): string => {
  const index = text.lastIndexOf(END_DOCUMENT);
  return index === -1 ? text : text.slice(0, index + END_DOCUMENT.length);
};

const dropProseBeforeDocumentClass = (text: string): string => {
  const index = text.search(DOCUMENT_CLASS);
  return index > 0 ? text.slice(index) : text;
};

export const convertMarkdown = (text: string): string =>
  text
    .replace(MARKDOWN_HEADING, (_match, hashes: string, title: string) => `\\${HEADING_COMMANDS[hashes.length - 1]}{${title}}`)
    .replace(MARKDOWN_BOLD, "\\textbf{$1}");

/** Removes everything around the LaTeX that the model or its client added. */
export const stripArtifacts = (raw: string, forbiddenMacros: readonly string[]): string => {
  let text = CLIENT_TRACE_PATTERNS.reduce((current, pattern) => current.replace(pattern, ""), raw);
  text = normalizeLineEndings(text.replace(ESCAPED_NEWLINE, "\n"));
  text = text.replace(FENCE_LINE, "").replace(/```/g, "");
  text = dropProseBeforeDocumentClass(cutAfterLastDocumentEnd(text));
  text = stripCommentary(text, forbiddenMacros);
  return convertMarkdown(text).trim();
};
