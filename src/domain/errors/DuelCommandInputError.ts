import { DuelError } from "./DuelError.js";

export class DuelCommandInputError extends DuelError {
  readonly category = "validation" as const;

  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message);
    this.name = "DuelCommandInputError";
  }

  static because(issues: readonly string[]): DuelCommandInputError {
    const [firstIssue] = issues;
    const message =
      issues.length === 0
        ? "Invalid command input"
        : issues.length === 1
          ? (firstIssue ?? "Invalid command input")
          : `Invalid command input: ${issues.join("; ")}`;
    return new DuelCommandInputError(message, issues);
  }
}
