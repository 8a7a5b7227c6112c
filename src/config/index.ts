/**
 * Application configuration.
 * Reads the environment and exposes typed, validated configuration values.
 */

import { envVariableFor, readConfigEnvironment, type EnvSource } from "./env.js";
import { AppConfigSchema, type AppConfig } from "./schema.js";
import { ConfigValidationError, deepFreeze, toValidationIssues } from "./validation.js";
import type { LogLevel } from "../logging/index.js";

export {
  APP_ENV_VARIABLES,
  VIEW_ENV_VARIABLES,
  envVariableFor,
  readConfigEnvironment,
  type EnvSource,
} from "./env.js";
export { AppConfigSchema, ENVIRONMENTS, Environment, FlagSchema, type AppConfig } from "./schema.js";
export {
  ConfigError,
  ConfigValidationError,
  type ConfigValidationIssue,
} from "./validation.js";

export * from "./view/index.js";

function parseAppConfig(input: unknown): Readonly<AppConfig> {
  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      "application",
      toValidationIssues(result.error.issues, envVariableFor)
    );
  }
  return deepFreeze(result.data);
}

/**
 * Build configuration from environment variables.
 *
 * @throws ConfigValidationError naming each offending variable
 */
export function loadAppConfig(source: EnvSource = process.env): Readonly<AppConfig> {
  return parseAppConfig(readConfigEnvironment(source));
}

let cached: Readonly<AppConfig> | undefined;

/** Configuration singleton, loaded on first access. */
export function getConfig(): Readonly<AppConfig> {
  if (cached === undefined) {
    cached = loadAppConfig();
  }
  return cached;
}

/**
 * Validate that configuration values are usable.
 * Call this at application startup to fail fast.
 *
 * @throws ConfigValidationError
 */
export function validateConfig(config: unknown = getConfig()): Readonly<AppConfig> {
  return parseAppConfig(config);
}

/**
 * Log level from configuration, after validation.
 */
export function configuredLogLevel(config: AppConfig = getConfig()): LogLevel {
  const { debug, logLevel } = validateConfig(config);
  return debug ? "debug" : logLevel;
}
