/**
 * Template view.
 *
 * Renders a template, the layout it declares, and the sections and
 * partials its nodes ask for, keeping a rendering stack so that every
 * nested call knows what it is inside of.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ENTRY POINTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   render(action?)        top-level template, wrapped by its layout if it
 *                          declares one
 *   renderSection(name)    a named child of the current template
 *   renderPartial(name)    a separately resolved template fragment, whole
 *                          or one of its sections
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SCOPES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   - render() evaluates against the base context.
 *   - A section rendered from a layout uses the layout's context as is;
 *     the section belongs to the template the layout wraps.
 *   - Any other section, and every partial, gets a clone of the current
 *     context with the supplied variables overlaid. The caller's
 *     variables are never modified.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * FAILURES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   - Passthrough source is returned verbatim by the entry point that
 *     encountered it.
 *   - Unknown templates, sections and partials render as "" when
 *     `ignoreUnknown` is set; otherwise, like every other recoverable
 *     error, they are rendered by the context's error handler.
 *   - Only StackUnderflowError escapes an entry point.
 */

import type {
  ParsedTemplate,
  TemplateParser,
  TemplatePaths,
  ViewErrorHandler,
  ViewRenderer,
} from "./collaborators.js";
import { RenderingContext } from "./context.js";
import { TolerantErrorHandler } from "./error-handler.js";
import { ChildNotFoundError, isUnknownResourceError } from "./errors.js";
import { TemplateKind, assertNever } from "./kinds.js";
import { attempt, type Outcome } from "./outcome.js";
import { TemplateResolver } from "./resolver.js";
import { RenderSession } from "./session.js";
import type { Variables } from "./variables.js";
import { DEFAULT_VIEW_CONFIG, type ViewConfig } from "../config/view/index.js";
import { generateSessionId, silentLogger, type Logger } from "../logging/index.js";

export interface TemplateViewOptions {
  paths: TemplatePaths;
  parser: TemplateParser;
  /** Base context; a fresh one built from `config` when omitted */
  context?: RenderingContext;
  config?: Readonly<ViewConfig>;
  logger?: Logger;
  /** Error handler of the fresh base context */
  errorHandler?: ViewErrorHandler;
}

/** An outcome that did not produce a value. */
type Unsettled = Extract<Outcome<unknown>, { status: "passthrough" | "failed" }>;

interface SectionScope {
  kind: TemplateKind;
  context: RenderingContext;
}

function upperCaseFirst(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function toLayoutName(value: unknown): string {
  if (typeof value === "string") return value;
  return value ? String(value) : "";
}

export class TemplateView implements ViewRenderer {
  private readonly config: Readonly<ViewConfig>;
  private readonly logger: Logger;
  private readonly resolver: TemplateResolver;
  private readonly session: RenderSession;

  constructor(options: TemplateViewOptions) {
    this.config = options.config ?? DEFAULT_VIEW_CONFIG;
    this.logger = (options.logger ?? silentLogger).child({ session: generateSessionId() });

    const context =
      options.context ??
      new RenderingContext({
        controllerName: this.config.defaultControllerName,
        controllerAction: this.config.defaultActionName,
        errorHandler: options.errorHandler ?? new TolerantErrorHandler(this.config.errorOutput),
      });

    this.resolver = new TemplateResolver(options.paths, options.parser, this.logger);
    this.session = new RenderSession(context, this.resolver, this.logger);
    this.initializeRenderingContext(context);
  }

  // -------------------------------------------------------------------------
  // Context & variables
  // -------------------------------------------------------------------------

  getRenderingContext(): RenderingContext {
    return this.session.getBaseContext();
  }

  setRenderingContext(context: RenderingContext): void {
    this.session.setBaseContext(context);
    this.initializeRenderingContext(context);
  }

  getRenderSession(): RenderSession {
    return this.session;
  }

  getTemplateResolver(): TemplateResolver {
    return this.resolver;
  }

  assign(key: string, value: unknown): this {
    this.session.getBaseContext().variables.add(key, value);
    return this;
  }

  assignMultiple(values: Variables): this {
    const variables = this.session.getBaseContext().variables;
    for (const [key, value] of Object.entries(values)) {
      variables.add(key, value);
    }
    return this;
  }

  /** Attach this view so evaluated nodes can call back into it. */
  protected initializeRenderingContext(context: RenderingContext): void {
    context.view = this;
  }

  // -------------------------------------------------------------------------
  // Entry points
  // -------------------------------------------------------------------------

  /**
   * Render the template for the current controller and action, through
   * its layout when it declares a non-empty layout name.
   *
   * @param actionName - Replaces the context's action; first letter upper-cased
   */
  render(actionName?: string): string {
    const context = this.session.currentScope();
    if (actionName) {
      context.controllerAction = upperCaseFirst(actionName);
    }

    const template = attempt(() => {
      const parsed = this.session.currentTemplate();
      parsed.bindArguments(context);
      return parsed;
    });
    if (template.status !== "ok") return this.settle(template, context, false);
    const parsedTemplate = template.value;

    const declared = attempt(() =>
      parsedTemplate
        .getNamedChild(this.config.layoutChildName)
        .bindArguments(context)[this.config.layoutNameArgument]
    );
    let layoutName = "";
    if (declared.status === "ok") {
      layoutName = toLayoutName(declared.value);
    } else if (declared.status === "passthrough" || !(declared.error instanceof ChildNotFoundError)) {
      return this.settle(declared, context, false);
    }

    const baseContext = this.session.getBaseContext();

    if (!layoutName) {
      return this.evaluateFrame(TemplateKind.Template, parsedTemplate, baseContext, () =>
        parsedTemplate.evaluate(baseContext)
      );
    }

    const layout = attempt(() => {
      const parsed = this.resolver.resolve({ kind: TemplateKind.Layout, name: layoutName });
      parsed.bindArguments(context);
      return parsed;
    });
    if (layout.status !== "ok") return this.settle(layout, context, false);
    const parsedLayout = layout.value;

    // The frame keeps the template: sections the layout renders live there.
    return this.evaluateFrame(TemplateKind.Layout, parsedTemplate, baseContext, () =>
      parsedLayout.evaluate(baseContext)
    );
  }

  /**
   * Render a named section of the current template.
   *
   * @param variables     - Overlaid on a clone of the current scope; unused
   *                        when called from a layout
   * @param ignoreUnknown - Render "" instead of an error for a missing
   *                        template or section
   */
  renderSection(sectionName: string, variables: Variables = {}, ignoreUnknown = false): string {
    const { kind, context } = this.sectionScope(variables);

    const template = attempt(() => this.session.currentTemplate());
    if (template.status !== "ok") return this.settle(template, context, ignoreUnknown);
    const parsedTemplate = template.value;

    const section = attempt(() => parsedTemplate.getNamedChild(sectionName));
    if (section.status !== "ok") return this.settle(section, context, ignoreUnknown);
    const sectionNode = section.value;

    return this.evaluateFrame(kind, parsedTemplate, context, () => sectionNode.evaluate(context));
  }

  /**
   * Render a partial, or one section of it, in a clone of the current scope.
   *
   * @param ignoreUnknown - Render "" instead of an error for a missing
   *                        partial or section
   */
  renderPartial(
    partialName: string,
    sectionName: string | undefined,
    variables: Variables,
    ignoreUnknown = false
  ): string {
    const context = this.session.currentScope().clone();

    const partial = attempt(() => {
      const parsed = this.resolver.resolve({ kind: TemplateKind.Partial, name: partialName });
      parsed.bindArguments(context);
      return parsed;
    });
    if (partial.status !== "ok") return this.settle(partial, context, ignoreUnknown);
    const parsedPartial = partial.value;

    return this.evaluateFrame(TemplateKind.Partial, parsedPartial, context, () => {
      if (sectionName !== undefined) {
        return this.renderSection(sectionName, variables, ignoreUnknown);
      }
      context.overlayVariables(variables);
      return parsedPartial.evaluate(context);
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private sectionScope(variables: Variables): SectionScope {
    const currentKind = this.session.currentKind();
    switch (currentKind) {
      case TemplateKind.Layout:
        return { kind: TemplateKind.Template, context: this.session.currentScope() };
      case TemplateKind.Template:
      case TemplateKind.Partial: {
        const context = this.session.currentScope().clone();
        context.overlayVariables(variables);
        return { kind: currentKind, context };
      }
      default:
        return assertNever(currentKind);
    }
  }

  private evaluateFrame(
    kind: TemplateKind,
    template: ParsedTemplate,
    context: RenderingContext,
    body: () => string
  ): string {
    const output = attempt(() => this.session.withFrame(kind, template, context, body));
    if (output.status !== "ok") return this.settle(output, context, false);
    return output.value;
  }

  private settle(outcome: Unsettled, context: RenderingContext, ignoreUnknown: boolean): string {
    if (outcome.status === "passthrough") {
      return outcome.source;
    }
    if (ignoreUnknown && isUnknownResourceError(outcome.error)) {
      this.logger.debug("Ignoring unknown view resource", { message: outcome.error.message });
      return "";
    }
    this.logger.warn("Delegating view error", {
      error: outcome.error.name,
      message: outcome.error.message,
    });
    return context.errorHandler.handleViewError(outcome.error);
  }
}
