const CONTROL_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export const normalizeLineEndings = (text: string): string => text.replace(/\r\n?/g, "\n");

export const tidyWhitespace = (text: string): string =>
  normalizeLineEndings(text)
    .replace(/\t/g, " ")
    .replace(CONTROL_CHARACTERS, "")
    .replace(/ +$/gm, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
