import { z } from "zod";

export const documentSectionSchema = z.object({
  title: z.string().default(""),
  instructions: z.string().optional()
});

export const documentSpecSchema = z.object({
  document_type: z.string().trim().min(1, "document_type must not be blank").optional(),
  title: z.string().optional(),
  author: z.string().optional(),
  sections: z.array(documentSectionSchema).default([]),
  notes: z.string().optional()
});

export type DocumentSpec = z.infer<typeof documentSpecSchema>;

/** Describes the requested document structure as a plain-text request. */
export const documentSpecToPrompt = (spec: DocumentSpec): string => {
  const lines = [`Document type: ${spec.document_type ?? "document"}`];
  if (spec.title !== undefined) {
    lines.push(`Title: ${spec.title}`);
  }
  if (spec.author !== undefined) {
    lines.push(`Author: ${spec.author}`);
  }
  lines.push("Sections:");
  spec.sections.forEach((section, index) => {
    lines.push(`  - Section ${index + 1}: ${section.title}`);
    if (section.instructions) {
      lines.push(`    Instructions: ${section.instructions}`);
    }
  });
  if (spec.notes) {
    lines.push("Notes:", spec.notes);
  }
  lines.push("\nProduce only LaTeX matching this structure.");
  return lines.join("\n");
};
