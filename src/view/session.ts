/**
 * Rendering stack.
 *
 * Each frame records what is being rendered (kind), the parsed template
 * that sections are looked up in, and the context nodes evaluate against.
 * The stack depth mirrors the nesting of render/renderSection/renderPartial
 * calls. Frames are only pushed and popped in pairs; use withFrame() so
 * the pop also happens when the body throws.
 */

import type { ParsedTemplate } from "./collaborators.js";
import type { RenderingContext } from "./context.js";
import { StackUnderflowError } from "./errors.js";
import { TemplateKind } from "./kinds.js";
import type { TemplateResolver } from "./resolver.js";
import { silentLogger, type Logger } from "../logging/index.js";

export interface RenderingFrame {
  readonly kind: TemplateKind;
  readonly template: ParsedTemplate;
  readonly context: RenderingContext;
}

export class RenderSession {
  private readonly stack: RenderingFrame[] = [];

  constructor(
    private baseContext: RenderingContext,
    private readonly resolver: TemplateResolver,
    private readonly logger: Logger = silentLogger
  ) {}

  get depth(): number {
    return this.stack.length;
  }

  getBaseContext(): RenderingContext {
    return this.baseContext;
  }

  setBaseContext(context: RenderingContext): void {
    this.baseContext = context;
  }

  startRendering(kind: TemplateKind, template: ParsedTemplate, context: RenderingContext): void {
    this.stack.push({ kind, template, context });
    this.logger.debug("Rendering started", { kind, depth: this.stack.length });
  }

  /**
   * @throws StackUnderflowError when no frame is open
   */
  stopRendering(): RenderingFrame {
    const frame = this.stack.pop();
    if (frame === undefined) {
      throw new StackUnderflowError();
    }
    this.logger.debug("Rendering stopped", { kind: frame.kind, depth: this.stack.length });
    return frame;
  }

  /** Push a frame, run `body`, and pop the frame however `body` exits. */
  withFrame<T>(
    kind: TemplateKind,
    template: ParsedTemplate,
    context: RenderingContext,
    body: () => T
  ): T {
    this.startRendering(kind, template, context);
    try {
      return body();
    } finally {
      this.stopRendering();
    }
  }

  currentKind(): TemplateKind {
    return this.top()?.kind ?? TemplateKind.Template;
  }

  /**
   * Template of the open frame. With no frame open, resolves the template
   * for the current controller and action; the result is not pushed.
   *
   * @throws TemplateNotFoundError, PassthroughCondition from resolution
   */
  currentTemplate(): ParsedTemplate {
    const frame = this.top();
    if (frame) return frame.template;

    const context = this.currentScope();
    return this.resolver.resolve({
      kind: TemplateKind.Template,
      controllerName: context.controllerName,
      actionName: context.controllerAction,
    });
  }

  currentScope(): RenderingContext {
    return this.top()?.context ?? this.baseContext;
  }

  private top(): RenderingFrame | undefined {
    return this.stack[this.stack.length - 1];
  }
}
