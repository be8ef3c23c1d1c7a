import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { DatasetRecord } from "./types.js";

const cellSchema = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? "" : String(value).trim()));

const keywordsSchema = z
  .union([z.string(), z.array(z.string()), z.null()])
  .optional()
  .transform((value) => {
    const items = Array.isArray(value) ? value : typeof value === "string" ? value.split(",") : [];
    return items.map((keyword) => keyword.trim().toLowerCase()).filter((keyword) => keyword.length > 0);
  });

// Column names follow the dataset sheet export.
export const datasetRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value).trim()).pipe(z.string().min(1)),
  user_prompt: cellSchema,
  keywords: keywordsSchema,
  doc_type: cellSchema,
  document_structure: cellSchema,
  content_elements: cellSchema,
  latex_output: cellSchema
});

export class DatasetFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetFormatError";
  }
}

export const toDatasetRecord = (row: z.infer<typeof datasetRowSchema>): DatasetRecord => ({
  id: row.id,
  userPrompt: row.user_prompt,
  keywords: row.keywords,
  documentType: row.doc_type.toLowerCase(),
  documentStructure: row.document_structure,
  contentElements: row.content_elements,
  latexOutput: row.latex_output
});

export const parseDataset = (raw: unknown): DatasetRecord[] => {
  const rows = z.array(z.unknown()).safeParse(raw);
  if (!rows.success) {
    throw new DatasetFormatError("Dataset must be a JSON array of rows.");
  }

  const records: DatasetRecord[] = [];
  const seen = new Set<string>();
  rows.data.forEach((row, index) => {
    const parsed = datasetRowSchema.safeParse(row);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`).join("; ");
      throw new DatasetFormatError(`Dataset row ${index} is invalid: ${details}`);
    }
    if (seen.has(parsed.data.id)) {
      throw new DatasetFormatError(`Dataset row ${index} repeats id "${parsed.data.id}".`);
    }
    seen.add(parsed.data.id);
    records.push(toDatasetRecord(parsed.data));
  });

  return records;
};

export const loadDataset = async (filePath: string): Promise<DatasetRecord[]> => {
  const resolved = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  const content = await fs.readFile(resolved, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid json";
    throw new DatasetFormatError(`Dataset file ${resolved} is not valid JSON: ${message}`);
  }
  return parseDataset(raw);
};

export const buildEmbeddingText = (record: DatasetRecord): string =>
  [
    `DOC_ID: ${record.id}`,
    `DOC_TYPE: ${record.documentType}`,
    `PROMPT: ${record.userPrompt}`,
    `KEYWORDS: ${record.keywords.join(", ")}`,
    `STRUCTURE: ${record.documentStructure}`,
    `ELEMENTS: ${record.contentElements}`
  ].join("\n---\n");
