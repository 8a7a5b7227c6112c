/**
 * View configuration loader.
 *
 * Validates against the schema with fail-fast behavior and freezes the
 * result.
 */

import { ViewConfigSchema, type ViewConfig } from "./schema.js";
import {
  ConfigValidationError,
  deepFreeze,
  toValidationIssues,
  type ConfigValidationIssue,
} from "../validation.js";

/**
 * Structured validation error for view configuration.
 */
export class ViewConfigError extends ConfigValidationError {
  constructor(issues: ConfigValidationIssue[]) {
    super("view", issues);
    this.name = "ViewConfigError";
  }
}

/**
 * Validate and load view configuration. Omitted fields take their defaults.
 *
 * @throws ViewConfigError if validation fails
 */
export function loadViewConfig(input: unknown): Readonly<ViewConfig> {
  const result = ViewConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ViewConfigError(toValidationIssues(result.error.issues));
  }
  return deepFreeze(result.data);
}
