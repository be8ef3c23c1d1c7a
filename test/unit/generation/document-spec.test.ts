import { describe, expect, it } from "vitest";
import { documentSpecSchema, documentSpecToPrompt } from "../../../src/modules/generation/document-spec.js";

describe("modules/generation/document-spec", () => {
  it("describes sections and their instructions", () => {
    const spec = documentSpecSchema.parse({
      document_type: "assignment",
      title: "AD1 - Math",
      author: "Alice",
      sections: [{ title: "Q1", instructions: "Generate one short problem" }, { title: "Q2" }]
    });

    expect(documentSpecToPrompt(spec)).toBe(
      "Document type: assignment\nTitle: AD1 - Math\nAuthor: Alice\nSections:\n  - Section 1: Q1\n    Instructions: Generate one short problem\n  - Section 2: Q2\n\nProduce only LaTeX matching this structure."
    );
  });

  it("fills gaps with neutral values", () => {
    const spec = documentSpecSchema.parse({ sections: [{}], notes: "Keep it short" });

    expect(documentSpecToPrompt(spec)).toBe(
      "Document type: document\nSections:\n  - Section 1: \nNotes:\nKeep it short\n\nProduce only LaTeX matching this structure."
    );
  });

  it("rejects a blank document type", () => {
    expect(documentSpecSchema.safeParse({ document_type: "  " }).success).toBe(false);
  });
});
