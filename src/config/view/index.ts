/**
 * View configuration module.
 *
 * Usage:
 *   import { loadViewConfig } from "./config/view/index.js";
 *
 *   const config = loadViewConfig({ errorOutput: "comment" });
 */

export type { ViewConfig, ViewConfigInput } from "./schema.js";
export { ViewConfigSchema, ErrorOutput } from "./schema.js";

export { loadViewConfig, ViewConfigError } from "./loader.js";

export { DEFAULT_VIEW_CONFIG } from "./defaults.js";
