export type PromptExample = {
  userPrompt: string;
  latexOutput: string;
};

export const LATEX_GENERATOR_RULES = [
  "You are a STRICT LaTeX generator.",
  "Output ONLY valid LaTeX source.",
  "NEVER use markdown, NEVER use ``` fences.",
  "Do NOT explain anything, do not add commentary."
];

export const BODY_ONLY_RULES = [
  "IMPORTANT: A template will wrap your output. YOU MUST ONLY GENERATE",
  "the LaTeX BODY, the content that goes inside the document environment.",
  "DO NOT output any of the following anywhere in your response:",
  "- \\documentclass{...}",
  "- \\usepackage{...}",
  "- \\begin{document}",
  "- \\end{document}",
  "- Any preamble-level macros (eg. \\newcommand, \\title, \\author).",
  "Output should start with content elements like \\section{...} or plain paragraphs."
];

export const FULL_DOCUMENT_RULES = [
  "If no template is provided, you may generate a full LaTeX document,",
  "including \\documentclass and preamble as needed."
];

export const EXAMPLE_SEPARATOR = "-".repeat(30);

export const buildGenerationPrompt = (input: {
  userRequest: string;
  examples: readonly PromptExample[];
  templateProvided: boolean;
}): string => {
  const exampleLines = input.examples.flatMap((example) => [
    "EXAMPLE_PROMPT:",
    example.userPrompt,
    "EXAMPLE_LATEX:",
    example.latexOutput,
    EXAMPLE_SEPARATOR
  ]);

  return [
    ...LATEX_GENERATOR_RULES,
    "",
    ...(input.templateProvided ? BODY_ONLY_RULES : FULL_DOCUMENT_RULES),
    "",
    "EXAMPLES (for format guidance):",
    ...(exampleLines.length > 0 ? exampleLines : ["(none)"]),
    "USER_REQUEST:",
    input.userRequest,
    input.templateProvided
      ? "Respond ONLY with LaTeX source (respect the body-only rule above)."
      : "Respond ONLY with LaTeX source."
  ].join("\n");
};
