export type NotFoundResource =
  | "Session"
  | "Active session"
  | "Participant"
  | "Word";

export class NotFoundError extends Error {
  constructor(
    public readonly resource: NotFoundResource,
    public readonly key: string,
  ) {
    super(`${resource} not found: ${key}`);
    this.name = "NotFoundError";
  }
}
