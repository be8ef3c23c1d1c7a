export class InvalidGenerationRequestError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid generation request: ${issues.join("; ")}`);
    this.name = "InvalidGenerationRequestError";
    this.issues = issues;
  }
}

export class CompletionProviderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CompletionProviderError";
  }
}
