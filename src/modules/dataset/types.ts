export type DatasetRecord = {
  readonly id: string;
  readonly userPrompt: string;
  readonly keywords: readonly string[];
  readonly documentType: string;
  readonly documentStructure: string;
  readonly contentElements: string;
  readonly latexOutput: string;
};

export type DatasetEntry = DatasetRecord & {
  readonly embedding: readonly number[];
};
