const PLACEHOLDER_TOKEN = /\{\{([A-Z][A-Z0-9_]*)\}\}/g;

export const DEFAULT_PLACEHOLDER_VALUES: Readonly<Record<string, string>> = Object.freeze({
  TITLE: "Untitled Document",
  AUTHOR: "",
  DATE: "\\today",
  STUDENT_NAME: "Student",
  COURSE: ""
});

const LATEX_SPECIAL_CHARACTERS: Readonly<Record<string, string>> = {
  "\\": "\\textbackslash{}",
  "{": "\\{",
  "}": "\\}",
  $: "\\$",
  "&": "\\&",
  "#": "\\#",
  "%": "\\%",
  _: "\\_",
  "^": "\\textasciicircum{}",
  "~": "\\textasciitilde{}"
};

export const escapeLatex = (value: string): string =>
  value
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[\\{}$&#%_^~]/g, (char) => LATEX_SPECIAL_CHARACTERS[char] ?? char);

export type PlaceholderValues = Readonly<Record<string, string | undefined>>;

export interface PlaceholderFill {
  text: string;
  unresolved: string[];
}

/**
 * Request values are escaped; defaults are trusted LaTeX (`\today`) and go in
 * as they are. Tokens without either are left in place and reported.
 */
export const fillPlaceholders = (
  text: string,
  placeholders: ReadonlySet<string>,
  values: PlaceholderValues,
  defaults: Readonly<Record<string, string>> = DEFAULT_PLACEHOLDER_VALUES
): PlaceholderFill => {
  const unresolved = new Set<string>();

  const filled = text.replace(PLACEHOLDER_TOKEN, (token: string, name: string) => {
    if (!placeholders.has(name)) {
      return token;
    }
    const provided = Object.hasOwn(values, name) ? values[name] : undefined;
    if (provided !== undefined) {
      return escapeLatex(provided);
    }
    if (Object.hasOwn(defaults, name)) {
      return defaults[name];
    }
    unresolved.add(name);
    return token;
  });

  return { text: filled, unresolved: [...unresolved] };
};
