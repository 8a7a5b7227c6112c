/**
 * View configuration schema.
 *
 * Names the defaults a view falls back to when it is created without a
 * rendering context, and the conventions templates use to declare their
 * layout. Every field has a default, so `{}` is a complete configuration.
 * The configuration is validated once and then treated as read-only.
 */

import { z } from "zod";

/** What the default error handler renders in place of a failed view part. */
export const ErrorOutput = z.enum(["message", "comment", "silent"]);
export type ErrorOutput = z.infer<typeof ErrorOutput>;

export const ViewConfigSchema = z
  .object({
    /** Controller of the base context when none is supplied */
    defaultControllerName: z
      .string()
      .min(1)
      .default("Default")
      .describe("Controller name used to resolve the top-level template"),

    /** Action of the base context when none is supplied */
    defaultActionName: z
      .string()
      .min(1)
      .default("Default")
      .describe("Action name used to resolve the top-level template"),

    /** Named child through which a template declares its layout */
    layoutChildName: z
      .string()
      .min(1)
      .default("layoutName")
      .describe("Name of the template child that declares the layout"),

    /** Argument of the layout child that carries the layout name */
    layoutNameArgument: z
      .string()
      .min(1)
      .default("name")
      .describe("Argument holding the layout name on the layout child"),

    errorOutput: ErrorOutput.default("message").describe(
      "Rendering of recoverable view errors: full message, HTML comment, or nothing"
    ),
  })
  .strict();

export type ViewConfig = z.infer<typeof ViewConfigSchema>;
export type ViewConfigInput = z.input<typeof ViewConfigSchema>;
