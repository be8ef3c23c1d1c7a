import { describe, expect, it } from "vitest";
import {
  DEFAULT_FORBIDDEN_MACROS,
  findForbiddenMacros,
  findGroupEnd,
  removeForbiddenMacros
} from "../../../src/modules/latex/forbidden-macros.js";

describe("modules/latex/forbidden-macros", () => {
  it("lists each forbidden macro once, in order of appearance", () => {
    expect(findForbiddenMacros("\\newcommand{\\a}{b} \\def\\c{d} \\newcommand{\\e}{f}")).toEqual(["newcommand", "def"]);
  });

  it("ignores a macro name preceded by a line break", () => {
    expect(findForbiddenMacros("line\\\\def")).toEqual([]);
  });

  it("does not match longer command names", () => {
    expect(findForbiddenMacros("\\letter \\includegraphics{x} \\defaultfont")).toEqual([]);
  });

  it("removes definitions together with their parameters and bodies", () => {
    expect(removeForbiddenMacros("\\renewcommand*{\\x}[1]{#1}\nText")).toBe("Text");
    expect(removeForbiddenMacros("\\let\\foo=\\bar rest")).toBe("rest");
    expect(removeForbiddenMacros("\\catcode`\\@=11 text")).toBe("text");
    expect(removeForbiddenMacros("\\newenvironment{box}{\\begin{center}}{\\end{center}}\nBody")).toBe("Body");
  });

  it("removes file inclusion in both argument styles", () => {
    expect(removeForbiddenMacros("\\include{chapter1} after")).toBe("after");
    expect(removeForbiddenMacros("\\input chapter1.tex\nNext")).toBe("Next");
  });

  it("keeps text without forbidden macros", () => {
    expect(removeForbiddenMacros("\\section{A}")).toBe("\\section{A}");
    expect(removeForbiddenMacros("\\section{A}", [])).toBe("\\section{A}");
  });

  it("accepts names with or without a leading backslash", () => {
    expect(removeForbiddenMacros("\\hspace{1em}Text", ["\\hspace"])).toBe("Text");
  });

  it("finds the end of a balanced group or falls back to the end of the line", () => {
    expect(findGroupEnd("{a{b}\\}c}d", 0)).toBe(9);
    expect(findGroupEnd("{open\nnext", 0)).toBe(5);
  });

  it("ships the documented default set", () => {
    expect(DEFAULT_FORBIDDEN_MACROS).toContain("newcommand");
    expect(DEFAULT_FORBIDDEN_MACROS).toContain("write");
    expect(DEFAULT_FORBIDDEN_MACROS).toHaveLength(18);
  });
});
