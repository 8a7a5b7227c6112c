/**
 * Rendering context: the variable scope of one nesting level plus the
 * controller/action that select the top-level template.
 */

import type { ViewErrorHandler, ViewRenderer } from "./collaborators.js";
import { StandardVariableProvider, type VariableProvider, type Variables } from "./variables.js";

export interface RenderingContextOptions {
  controllerName: string;
  controllerAction: string;
  errorHandler: ViewErrorHandler;
  variables?: VariableProvider;
}

export class RenderingContext {
  controllerName: string;
  controllerAction: string;
  variables: VariableProvider;
  readonly errorHandler: ViewErrorHandler;
  /** Set when a view adopts the context; nodes call back into it. */
  view: ViewRenderer | undefined;

  constructor(options: RenderingContextOptions) {
    this.controllerName = options.controllerName;
    this.controllerAction = options.controllerAction;
    this.errorHandler = options.errorHandler;
    this.variables = options.variables ?? new StandardVariableProvider();
    this.view = undefined;
  }

  /**
   * Copy for a nested level. Variables are cloned; the error handler and
   * view are shared.
   */
  clone(): RenderingContext {
    const copy = new RenderingContext({
      controllerName: this.controllerName,
      controllerAction: this.controllerAction,
      errorHandler: this.errorHandler,
      variables: this.variables.clone(),
    });
    copy.view = this.view;
    return copy;
  }

  /** Replace this context's variables with a copy overlaid by `overlay`. */
  overlayVariables(overlay: Variables): void {
    this.variables = this.variables.scopeCopyWithOverlay(overlay);
  }
}
