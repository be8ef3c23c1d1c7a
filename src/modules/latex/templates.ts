import { UnknownTemplateError } from "./errors.js";
import { BODY_CLOSE_MARKER, BODY_OPEN_MARKER, type Template } from "./types.js";

const PLACEHOLDER_TOKEN = /\{\{([A-Z][A-Z0-9_]*)\}\}/g;

const placeholdersOf = (...parts: string[]): ReadonlySet<string> =>
  new Set(parts.flatMap((part) => [...part.matchAll(PLACEHOLDER_TOKEN)].map((match) => match[1])));

const defineTemplate = (name: string, description: string, preambleText: string, bodyPrefix: string): Template =>
  Object.freeze({
    name,
    description,
    preambleText,
    bodyPrefix,
    bodyOpenMarker: BODY_OPEN_MARKER,
    bodyCloseMarker: BODY_CLOSE_MARKER,
    placeholders: placeholdersOf(preambleText, bodyPrefix)
  });

const ARTICLE_MINIMAL = defineTemplate(
  "article_minimal",
  "Plain article with a title block.",
  [
    "\\documentclass[11pt]{article}",
    "\\usepackage[utf8]{inputenc}",
    "\\usepackage[T1]{fontenc}",
    "\\usepackage{amsmath,amssymb}",
    "\\usepackage{graphicx}",
    "\\usepackage{hyperref}",
    "",
    "\\title{{{TITLE}}}",
    "\\author{{{AUTHOR}}}",
    "\\date{{{DATE}}}",
    ""
  ].join("\n"),
  "\\maketitle"
);

const ASSIGNMENT = defineTemplate(
  "assignment",
  "Homework hand-in with student and course in the page header.",
  [
    "\\documentclass[12pt]{article}",
    "\\usepackage[utf8]{inputenc}",
    "\\usepackage[a4paper,margin=1in]{geometry}",
    "\\usepackage{amsmath,amssymb}",
    "\\usepackage{enumitem}",
    "\\usepackage{fancyhdr}",
    "",
    "\\pagestyle{fancy}",
    "\\fancyhf{}",
    "\\lhead{{{STUDENT_NAME}}}",
    "\\rhead{{{COURSE}}}",
    "\\cfoot{\\thepage}",
    "",
    "\\title{{{TITLE}}}",
    "\\author{{{STUDENT_NAME}}}",
    "\\date{{{DATE}}}",
    ""
  ].join("\n"),
  [
    "\\maketitle",
    "\\thispagestyle{fancy}"
  ].join("\n")
);

const REPORT = defineTemplate(
  "report",
  "Chaptered report with a table of contents.",
  [
    "\\documentclass[11pt]{report}",
    "\\usepackage[utf8]{inputenc}",
    "\\usepackage[T1]{fontenc}",
    "\\usepackage{amsmath,amssymb}",
    "\\usepackage{graphicx}",
    "\\usepackage{booktabs}",
    "\\usepackage{hyperref}",
    "",
    "\\title{{{TITLE}}}",
    "\\author{{{AUTHOR}}}",
    "\\date{{{DATE}}}",
    ""
  ].join("\n"),
  [
    "\\maketitle",
    "\\tableofcontents"
  ].join("\n")
);

const TEMPLATE_REGISTRY: ReadonlyMap<string, Template> = new Map(
  [ARTICLE_MINIMAL, ASSIGNMENT, REPORT].map((template) => [template.name, template])
);

export const listTemplates = (): Template[] => [...TEMPLATE_REGISTRY.values()];

export const getTemplate = (name: string): Template => {
  const template = TEMPLATE_REGISTRY.get(name);
  if (!template) {
    throw new UnknownTemplateError(name, [...TEMPLATE_REGISTRY.keys()]);
  }
  return template;
};
