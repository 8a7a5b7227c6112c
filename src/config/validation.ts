/**
 * Configuration errors and the structured issues they carry.
 */

import type { ZodIssue } from "zod";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
  /** Environment variable the field was read from */
  variable?: string;
}

/**
 * A configuration object failed its schema.
 *
 * `subject` names the configuration in messages: "view", "application".
 */
export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly subject: string,
    public readonly issues: ConfigValidationIssue[]
  ) {
    super(`Invalid ${subject} configuration: ${issues.length} validation error(s)`);
    this.name = "ConfigValidationError";
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const title = this.subject.charAt(0).toUpperCase() + this.subject.slice(1);
    const lines = [`${title} configuration validation failed:`];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      const source = issue.variable ? ` (${issue.variable})` : "";
      lines.push(`  - ${path}${source}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export function toValidationIssues(
  zodIssues: ZodIssue[],
  variableFor: (path: (string | number)[]) => string | undefined = () => undefined
): ConfigValidationIssue[] {
  return zodIssues.map((issue) => {
    const variable = variableFor(issue.path);
    return {
      path: issue.path,
      message: issue.message,
      code: issue.code,
      ...(variable ? { variable } : {}),
    };
  });
}

/** Freeze a parsed configuration and every object nested in it. */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === "object" && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
