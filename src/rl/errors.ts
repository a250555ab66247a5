/**
 * Error types surfaced to callers. Both are fatal: there is no fallback
 * path for a bad parameter bundle or an unreadable value table.
 */

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class PersistenceError extends Error {
  readonly path?: string;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(options.path ? `${message} (${options.path})` : message, { cause: options.cause });
    this.name = "PersistenceError";
    this.path = options.path;
  }
}
