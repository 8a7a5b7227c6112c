/**
 * Application configuration schema.
 *
 * Accepts the raw strings read from the environment as well as already
 * typed values, so a parsed configuration validates again unchanged.
 */

import { z } from "zod";

import { ViewConfigSchema } from "./view/schema.js";
import { LOG_LEVELS } from "../logging/index.js";

export const ENVIRONMENTS = ["development", "production", "test"] as const;

export const Environment = z.enum(ENVIRONMENTS);
export type Environment = z.infer<typeof Environment>;

const FLAG_WORDS = ["true", "1", "yes", "false", "0", "no"] as const;

/** A boolean, or true/false/1/0/yes/no in any case. */
export const FlagSchema = z.union([
  z.boolean(),
  z
    .string()
    .toLowerCase()
    .pipe(z.enum(FLAG_WORDS))
    .transform((word) => word === "true" || word === "1" || word === "yes"),
]);

export const AppConfigSchema = z
  .object({
    env: Environment.default("development").describe("Current environment"),

    /** Forces the debug log level */
    debug: FlagSchema.default(false).describe("Enable debug mode"),

    logLevel: z.enum(LOG_LEVELS).default("info").describe("Minimum log level"),

    view: ViewConfigSchema.default({}).describe("View defaults and conventions"),
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;
