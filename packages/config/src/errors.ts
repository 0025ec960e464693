import type { ConfigIssue } from "./types.js";

export class ConfigError extends Error {
  public readonly issues: readonly ConfigIssue[];

  public constructor(issues: readonly ConfigIssue[]) {
    super(ConfigError.describe(issues));
    this.name = "ConfigError";
    this.issues = issues;
  }

  private static describe(issues: readonly ConfigIssue[]): string {
    if (issues.length === 0) {
      return "Invalid configuration";
    }
    const lines = issues.map((issue) => `${issue.path}: ${issue.message}`);
    return `Invalid configuration (${issues.length} issue${issues.length === 1 ? "" : "s"}): ${lines.join("; ")}`;
  }
}
