/**
 * Environment variables behind the application configuration.
 *
 * `.env` is loaded on import. Every configuration field is read from one
 * variable; unset and empty variables are left out of the raw config so
 * that the schema defaults apply.
 */

import "dotenv/config";

export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Top-level configuration fields and the variables they come from. */
export const APP_ENV_VARIABLES = {
  env: "NODE_ENV",
  debug: "DEBUG",
  logLevel: "LOG_LEVEL",
} as const;

/** View configuration fields and the variables they come from. */
export const VIEW_ENV_VARIABLES = {
  defaultControllerName: "VIEW_DEFAULT_CONTROLLER",
  defaultActionName: "VIEW_DEFAULT_ACTION",
  layoutChildName: "VIEW_LAYOUT_CHILD",
  layoutNameArgument: "VIEW_LAYOUT_ARGUMENT",
  errorOutput: "VIEW_ERROR_OUTPUT",
} as const;

type VariableTable = Readonly<Record<string, string>>;

function pick(variables: VariableTable, source: EnvSource): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [field, name] of Object.entries(variables)) {
    const value = source[name];
    if (value !== undefined && value !== "") {
      values[field] = value;
    }
  }
  return values;
}

function lookup(variables: VariableTable, field: string | number | undefined): string | undefined {
  if (typeof field !== "string" || !Object.hasOwn(variables, field)) return undefined;
  return variables[field];
}

/**
 * Collect the raw, unvalidated configuration from the environment.
 *
 * @example
 *   readConfigEnvironment({ LOG_LEVEL: "warn", VIEW_LAYOUT_CHILD: "wrapper" })
 *   // → { logLevel: "warn", view: { layoutChildName: "wrapper" } }
 */
export function readConfigEnvironment(
  source: EnvSource = process.env
): Record<string, unknown> {
  return { ...pick(APP_ENV_VARIABLES, source), view: pick(VIEW_ENV_VARIABLES, source) };
}

/** Variable a configuration path is read from, if any. */
export function envVariableFor(path: readonly (string | number)[]): string | undefined {
  const [head, field] = path;
  if (head === "view") return lookup(VIEW_ENV_VARIABLES, field);
  return lookup(APP_ENV_VARIABLES, head);
}
