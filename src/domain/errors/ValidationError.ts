export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "ValidationError";
  }

  static because(issues: readonly string[]): ValidationError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid input")
          : `Invalid input: ${issues.join("; ")}`;
    return new ValidationError(message, issues);
  }
}
