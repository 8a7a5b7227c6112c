/**
 * Builds a view from application configuration: view defaults from the
 * VIEW_* variables, console logging at the configured level.
 */

import type { TemplateParser, TemplatePaths } from "./collaborators.js";
import { TemplateView } from "./view.js";
import { configuredLogLevel, getConfig, type AppConfig } from "../config/index.js";
import { createLogger, type Logger } from "../logging/index.js";

export interface ViewCollaborators {
  paths: TemplatePaths;
  parser: TemplateParser;
  /** Overrides the console logger built from configuration */
  logger?: Logger;
}

/**
 * @throws ConfigValidationError when the configuration does not validate
 */
export function createTemplateView(
  collaborators: ViewCollaborators,
  config: Readonly<AppConfig> = getConfig()
): TemplateView {
  const logger = collaborators.logger ?? createLogger({ level: configuredLogLevel(config) });
  logger.debug("Creating template view", {
    env: config.env,
    defaultController: config.view.defaultControllerName,
    defaultAction: config.view.defaultActionName,
  });

  return new TemplateView({
    paths: collaborators.paths,
    parser: collaborators.parser,
    config: config.view,
    logger,
  });
}
