export class EmptyIndexError extends Error {
  constructor(message = "The similarity index holds no entries.") {
    super(message);
    this.name = "EmptyIndexError";
  }
}

export class InvalidFilterError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid retrieval filter: ${issues.join("; ")}`);
    this.name = "InvalidFilterError";
    this.issues = issues;
  }
}

export class RetrieverHealthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RetrieverHealthError";
  }
}
