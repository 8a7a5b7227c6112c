/**
 * Nested view rendering.
 *
 * ```typescript
 * import { MemoryTemplatePaths, TemplateView } from "./view/index.js";
 *
 * const paths = new MemoryTemplatePaths()
 *   .addTemplate("Blog", "Show", showSource)
 *   .addLayout("Default", layoutSource)
 *   .addPartial("Card", cardSource);
 *
 * const view = new TemplateView({ paths, parser });
 * view.getRenderingContext().controllerName = "Blog";
 * view.assign("post", post);
 *
 * const html = view.render("show");
 * ```
 *
 * The parser and the nodes it produces are supplied by the caller; see
 * collaborators.ts for the contracts.
 */

export { TemplateKind } from "./kinds.js";

export {
  PassthroughCondition,
  TemplateNotFoundError,
  ChildNotFoundError,
  InvalidSectionError,
  StackUnderflowError,
  isUnknownResourceError,
} from "./errors.js";

export { attempt, type Outcome } from "./outcome.js";

export {
  StandardVariableProvider,
  type VariableProvider,
  type Variables,
} from "./variables.js";

export { RenderingContext, type RenderingContextOptions } from "./context.js";

export type {
  TemplateArguments,
  TemplateNode,
  ParsedTemplate,
  TemplatePaths,
  TemplateParser,
  ViewErrorHandler,
  ViewRenderer,
} from "./collaborators.js";

export { MemoryTemplatePaths, type TemplateSources } from "./memory-paths.js";

export {
  TemplateResolver,
  resolutionKey,
  type ResolutionRequest,
} from "./resolver.js";

export { RenderSession, type RenderingFrame } from "./session.js";

export { TolerantErrorHandler } from "./error-handler.js";

export { TemplateView, type TemplateViewOptions } from "./view.js";

export { createTemplateView, type ViewCollaborators } from "./factory.js";
