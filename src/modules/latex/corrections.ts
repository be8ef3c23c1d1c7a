export type CorrectionReplacer = (match: string, ...captures: string[]) => string;

export interface CorrectionRule {
  readonly id: string;
  readonly description: string;
  readonly pattern: RegExp;
  readonly replacement: string | CorrectionReplacer;
}

// Commands whose doubled leading escape is almost always a JSON round-trip artifact.
const KNOWN_COMMANDS = [
  "documentclass",
  "usepackage",
  "begin",
  "end",
  "section",
  "subsection",
  "subsubsection",
  "paragraph",
  "chapter",
  "title",
  "author",
  "date",
  "today",
  "maketitle",
  "tableofcontents",
  "textbf",
  "textit",
  "texttt",
  "emph",
  "underline",
  "item",
  "label",
  "ref",
  "cite",
  "frac",
  "sqrt",
  "includegraphics",
  "caption",
  "centering",
  "hline",
  "noindent",
  "newpage",
  "footnote",
  "vspace",
  "hspace",
  "url",
  "href"
];

const PROTECTED_FROM_UNDERSCORE_ESCAPE = [
  String.raw`(?<!\\)\$\$[\s\S]*?(?<!\\)\$\$`,
  String.raw`(?<!\\)\$(?:\\[\s\S]|[^$\\])*\$`,
  String.raw`\\\([\s\S]*?\\\)`,
  String.raw`\\\[[\s\S]*?\\\]`,
  String.raw`\\begin\{(?:equation|align|gather|multline|eqnarray|math|displaymath|verbatim|lstlisting|minted)\*?\}[\s\S]*?\\end\{(?:equation|align|gather|multline|eqnarray|math|displaymath|verbatim|lstlisting|minted)\*?\}`,
  String.raw`\\(?:label|ref|eqref|pageref|cite|citep|citet|includegraphics|url|href|input|include|bibliography|bibliographystyle|usepackage|documentclass)\*?(?:\[[^\]\n]*\])?\{[^{}]*\}`,
  String.raw`(?<!\\)%[^\n]*`,
  String.raw`\{\{[A-Z][A-Z0-9_]*\}\}`
];

const restoreEscape =
  (letter: string): CorrectionReplacer =>
  (_match, stem) =>
    `\\${letter}${stem}`;

// Line-start variant: the eaten escape became the line break itself.
const restoreLineStartEscape =
  (letter: string): CorrectionReplacer =>
  (_match, lead, stem) =>
    `${lead}\\${letter}${stem}`;

export const CORRECTION_RULES: readonly CorrectionRule[] = Object.freeze([
  {
    id: "collapse-doubled-command-escape",
    description: "\\\\section -> \\section for known commands",
    pattern: new RegExp(String.raw`(?<!\\)(?:\\\\)+(?=(?:${KNOWN_COMMANDS.join("|")})(?![a-zA-Z]))`, "g"),
    replacement: "\\"
  },
  {
    id: "collapse-doubled-special-escape",
    description: "\\\\% -> \\% (also & # _)",
    pattern: /(?<!\\)\\\\(?=[%&#_])/g,
    replacement: "\\"
  },
  {
    id: "newline-eaten-escape",
    description: "<LF>oindent -> \\noindent",
    pattern: /(^|\n)(oindent|ewpage|ewline|ewcommand|ewenvironment|ewtheorem|ormalsize|onumber|otag|ocite)(?![a-zA-Z])/g,
    replacement: restoreLineStartEscape("n")
  },
  {
    id: "carriage-return-eaten-escape",
    description: "<CR>ef{ -> \\ref{ (CR is already a line feed here)",
    pattern: /(^|\n)(ef|ightarrow|aggedright|aggedleft|enewcommand|ule|aisebox)(?![a-zA-Z])/g,
    replacement: restoreLineStartEscape("r")
  },
  {
    id: "tab-eaten-escape",
    description: "<TAB>extbf -> \\textbf",
    pattern: /\t(extbf|extit|exttt|extsc|extsf|extrm|extwidth|extheight|extcolor|ext|ableofcontents|heta|imes|ilde|itle|hispagestyle|oday)(?![a-zA-Z])/g,
    replacement: restoreEscape("t")
  },
  {
    id: "backspace-eaten-escape",
    description: "<BS>egin -> \\begin",
    pattern: /\u0008(egin|eta|oldsymbol|ibliographystyle|ibliography|igskip|ackslash|ar|f)(?![a-zA-Z])/g,
    replacement: restoreEscape("b")
  },
  {
    id: "form-feed-eaten-escape",
    description: "<FF>rac -> \\frac",
    pattern: /\f(rac|ootnotesize|ootnote|box|ill|lushleft|lushright|orall|rame)(?![a-zA-Z])/g,
    replacement: restoreEscape("f")
  },
  {
    id: "vertical-tab-eaten-escape",
    description: "<VT>space -> \\vspace",
    pattern: /\v(space|fill|ec|skip|line)(?![a-zA-Z])/g,
    replacement: restoreEscape("v")
  },
  {
    id: "bell-eaten-escape",
    description: "<BEL>lpha -> \\alpha",
    pattern: /\u0007(lpha|uthor|ppendix|ddcontentsline|pprox|leph)(?![a-zA-Z])/g,
    replacement: restoreEscape("a")
  },
  {
    id: "missing-command-escape",
    description: "textbf{ -> \\textbf{",
    pattern: /(?<![\\a-zA-Z])(textbf|textit|emph|underline|texttt)\{/g,
    replacement: (_match, command) => `\\${command}{`
  },
  {
    id: "escape-bare-underscore",
    description: "a_b -> a\\_b outside math, verbatim and reference arguments",
    pattern: new RegExp(`(${PROTECTED_FROM_UNDERSCORE_ESCAPE.join("|")})|(?<!\\\\)_`, "g"),
    replacement: (match, protectedRegion: string | undefined) => (protectedRegion === undefined ? "\\_" : match)
  }
] satisfies CorrectionRule[]);

export const applyCorrections = (text: string, rules: readonly CorrectionRule[] = CORRECTION_RULES): string =>
  rules.reduce((current, rule) => {
    const { replacement } = rule;
    return typeof replacement === "string"
      ? current.replace(rule.pattern, replacement)
      : current.replace(rule.pattern, replacement);
  }, text);
