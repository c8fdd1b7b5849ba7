export class InsufficientResourceError extends Error {
  constructor(
    public readonly resource: "coins",
    public readonly required: number,
    public readonly available: number,
  ) {
    super(`Not enough ${resource}: ${required} required, ${available} available`);
    this.name = "InsufficientResourceError";
  }
}
