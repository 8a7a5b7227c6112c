/**
 * View error taxonomy.
 *
 *   PassthroughCondition   not a failure; the source is not templated and is
 *                          returned verbatim by the nearest entry point
 *   TemplateNotFoundError  \
 *   ChildNotFoundError      > recoverable; ignored or delegated to the
 *   InvalidSectionError    /  error handler at the entry point boundary
 *   StackUnderflowError    unpaired stopRendering(); fatal, never caught
 */

import type { TemplateKind } from "./kinds.js";

export class PassthroughCondition extends Error {
  constructor(
    public readonly source: string,
    message?: string
  ) {
    super(message ?? "Template source is not templated content");
    this.name = "PassthroughCondition";
  }
}

export class TemplateNotFoundError extends Error {
  constructor(
    public readonly kind: TemplateKind,
    public readonly templateName: string,
    message?: string
  ) {
    super(message ?? `No ${kind} source found for "${templateName}"`);
    this.name = "TemplateNotFoundError";
  }
}

export class ChildNotFoundError extends Error {
  constructor(
    public readonly childName: string,
    message?: string
  ) {
    super(message ?? `Template has no child named "${childName}"`);
    this.name = "ChildNotFoundError";
  }
}

export class InvalidSectionError extends Error {
  constructor(
    public readonly sectionName: string,
    public readonly reason: string,
    message?: string
  ) {
    super(message ?? `Section "${sectionName}" cannot be addressed: ${reason}`);
    this.name = "InvalidSectionError";
  }
}

export class StackUnderflowError extends Error {
  constructor(message?: string) {
    super(message ?? "stopRendering() called with an empty rendering stack");
    this.name = "StackUnderflowError";
  }
}

/**
 * Errors the `ignoreUnknown` flag silences: a name that points at nothing.
 */
export function isUnknownResourceError(error: Error): boolean {
  return (
    error instanceof TemplateNotFoundError ||
    error instanceof ChildNotFoundError ||
    error instanceof InvalidSectionError
  );
}
