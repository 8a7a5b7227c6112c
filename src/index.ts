/**
 * Public API of the nested view renderer.
 */

export * from "./view/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
