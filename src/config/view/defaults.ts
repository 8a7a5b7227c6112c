import { ViewConfigSchema, type ViewConfig } from "./schema.js";

export const DEFAULT_VIEW_CONFIG: Readonly<ViewConfig> = Object.freeze(ViewConfigSchema.parse({}));
