/**
 * Contracts of the collaborators a view renders through.
 *
 * Parsing, expression evaluation and source lookup live outside this
 * package; a view only needs the operations below.
 */

import type { RenderingContext } from "./context.js";
import type { Variables } from "./variables.js";

export type TemplateArguments = Readonly<Record<string, unknown>>;

/**
 * An evaluable node of a parsed template: the root, a section, or the
 * layout declaration.
 */
export interface TemplateNode {
  /** Evaluate the node's declared arguments against `context`. */
  bindArguments(context: RenderingContext): TemplateArguments;
  evaluate(context: RenderingContext): string;
}

/**
 * Root of a parsed template. Shared read-only between renders once cached.
 */
export interface ParsedTemplate extends TemplateNode {
  /** @throws ChildNotFoundError when no child carries `name` */
  getNamedChild(name: string): TemplateNode;
}

/**
 * Maps logical names to cache identifiers and raw source text.
 * The `*Source` methods throw TemplateNotFoundError for unknown names.
 */
export interface TemplatePaths {
  getTemplateIdentifier(controllerName: string, actionName: string): string;
  getLayoutIdentifier(layoutName: string): string;
  getPartialIdentifier(partialName: string): string;
  getTemplateSource(controllerName: string, actionName: string): string;
  getLayoutSource(layoutName: string): string;
  getPartialSource(partialName: string): string;
}

export interface TemplateParser {
  /** @throws PassthroughCondition when `source` is not templated content */
  parse(source: string, identifier: string): ParsedTemplate;
}

/**
 * Renders recoverable errors in place of the failed view part.
 * Implementations must return output and never throw.
 */
export interface ViewErrorHandler {
  handleViewError(error: Error): string;
}

/**
 * Entry points a view exposes to the nodes it evaluates.
 */
export interface ViewRenderer {
  render(actionName?: string): string;
  renderSection(sectionName: string, variables?: Variables, ignoreUnknown?: boolean): string;
  renderPartial(
    partialName: string,
    sectionName: string | undefined,
    variables: Variables,
    ignoreUnknown?: boolean
  ): string;
}
