/**
 * In-memory template sources, addressed the same way a file-backed
 * resolver would address them: `Controller/Action` for templates, plain
 * names for layouts and partials.
 */

import type { TemplatePaths } from "./collaborators.js";
import { TemplateNotFoundError } from "./errors.js";
import { TemplateKind } from "./kinds.js";

export interface TemplateSources {
  /** Keyed by "Controller/Action" */
  templates?: Record<string, string>;
  layouts?: Record<string, string>;
  partials?: Record<string, string>;
}

function templateName(controllerName: string, actionName: string): string {
  return `${controllerName}/${actionName}`;
}

export class MemoryTemplatePaths implements TemplatePaths {
  private readonly templates: Map<string, string>;
  private readonly layouts: Map<string, string>;
  private readonly partials: Map<string, string>;

  constructor(sources: TemplateSources = {}) {
    this.templates = new Map(Object.entries(sources.templates ?? {}));
    this.layouts = new Map(Object.entries(sources.layouts ?? {}));
    this.partials = new Map(Object.entries(sources.partials ?? {}));
  }

  addTemplate(controllerName: string, actionName: string, source: string): this {
    this.templates.set(templateName(controllerName, actionName), source);
    return this;
  }

  addLayout(layoutName: string, source: string): this {
    this.layouts.set(layoutName, source);
    return this;
  }

  addPartial(partialName: string, source: string): this {
    this.partials.set(partialName, source);
    return this;
  }

  getTemplateIdentifier(controllerName: string, actionName: string): string {
    return `template:${templateName(controllerName, actionName)}`;
  }

  getLayoutIdentifier(layoutName: string): string {
    return `layout:${layoutName}`;
  }

  getPartialIdentifier(partialName: string): string {
    return `partial:${partialName}`;
  }

  getTemplateSource(controllerName: string, actionName: string): string {
    const name = templateName(controllerName, actionName);
    return lookup(this.templates, TemplateKind.Template, name);
  }

  getLayoutSource(layoutName: string): string {
    return lookup(this.layouts, TemplateKind.Layout, layoutName);
  }

  getPartialSource(partialName: string): string {
    return lookup(this.partials, TemplateKind.Partial, partialName);
  }
}

function lookup(sources: Map<string, string>, kind: TemplateKind, name: string): string {
  const source = sources.get(name);
  if (source === undefined) {
    throw new TemplateNotFoundError(kind, name);
  }
  return source;
}
