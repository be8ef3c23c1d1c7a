import { describe, expect, it } from "vitest";
import {
  convertBullets,
  insertMissingFirstItem,
  removeEmptyLists,
  repairLists
} from "../../../src/modules/latex/list-repair.js";

describe("modules/latex/list-repair", () => {
  it("wraps bullet runs outside lists", () => {
    expect(convertBullets("Intro\n- a\n- b\nOutro")).toBe(
      "Intro\n\\begin{itemize}\n\\item a\n\\item b\n\\end{itemize}\nOutro"
    );
    expect(convertBullets("1. one\n2) two")).toBe("\\begin{enumerate}\n\\item one\n\\item two\n\\end{enumerate}");
  });

  it("starts a new list when the bullet kind changes", () => {
    expect(convertBullets("- a\n1. b")).toBe(
      "\\begin{itemize}\n\\item a\n\\end{itemize}\n\\begin{enumerate}\n\\item b\n\\end{enumerate}"
    );
  });

  it("turns bullets inside a list into items in place", () => {
    expect(convertBullets("\\begin{itemize}\n  - nested\n\\end{itemize}")).toBe(
      "\\begin{itemize}\n  \\item nested\n\\end{itemize}"
    );
  });

  it("leaves verbatim bodies alone", () => {
    const text = "\\begin{verbatim}\n- raw\n\\end{verbatim}";
    expect(convertBullets(text)).toBe(text);
  });

  it("inserts an item before leading list text", () => {
    expect(insertMissingFirstItem("\\begin{enumerate}[label=(\\alph*)]\nFirst\n\\end{enumerate}")).toBe(
      "\\begin{enumerate}[label=(\\alph*)]\n\\item First\n\\end{enumerate}"
    );
    expect(insertMissingFirstItem("\\begin{itemize}\n\\setlength{\\itemsep}{0pt}\n\\item A\n\\end{itemize}")).toBe(
      "\\begin{itemize}\n\\setlength{\\itemsep}{0pt}\n\\item A\n\\end{itemize}"
    );
  });

  it("removes empty lists", () => {
    expect(removeEmptyLists("A\n\\begin{itemize}\n\\end{itemize}\nB")).toBe("A\n\nB");
  });

  it("is stable on repaired text", () => {
    const once = repairLists("Steps:\n- one\n- two");
    expect(once).toBe("Steps:\n\\begin{itemize}\n\\item one\n\\item two\n\\end{itemize}");
    expect(repairLists(once)).toBe(once);
  });

  it("closes an open group after the list built from its bullets", () => {
    const once = repairLists("\\textbf{Tasks\n- write intro\n- add figures");

    expect(once).toBe("\\textbf{Tasks\n\\begin{itemize}\n\\item write intro\n\\item add figures\n\\end{itemize}}");
    expect(repairLists(once)).toBe(once);
  });

  it("removes a list it had to close itself", () => {
    expect(repairLists("\\begin{itemize}")).toBe("");
  });
});
