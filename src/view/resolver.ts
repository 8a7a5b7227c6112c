/**
 * Template resolver.
 *
 * Turns a logical name into a parsed template. The first request for a
 * name reads its source through TemplatePaths and parses it; every later
 * request for the same ResolutionKey returns the cached handle.
 *
 * Resolution is synchronous, so the cache has a single writer per key and
 * a key is parsed at most once per resolver. A source the parser rejects
 * as passthrough is not cached.
 */

import type { ParsedTemplate, TemplateParser, TemplatePaths } from "./collaborators.js";
import { TemplateKind, assertNever } from "./kinds.js";
import { silentLogger, type Logger } from "../logging/index.js";

export type ResolutionRequest =
  | { kind: TemplateKind.Template; controllerName: string; actionName: string }
  | { kind: TemplateKind.Layout; name: string }
  | { kind: TemplateKind.Partial; name: string };

/**
 * Cache key: one parsed template per distinct key. Names are encoded as a
 * JSON array, so no character inside a name can make two keys equal.
 */
export function resolutionKey(request: ResolutionRequest): string {
  switch (request.kind) {
    case TemplateKind.Template:
      return JSON.stringify([request.kind, request.controllerName, request.actionName]);
    case TemplateKind.Layout:
    case TemplateKind.Partial:
      return JSON.stringify([request.kind, request.name]);
    default:
      return assertNever(request);
  }
}

interface TemplateSource {
  identifier: string;
  source: string;
}

export class TemplateResolver {
  private readonly cache = new Map<string, ParsedTemplate>();

  constructor(
    private readonly paths: TemplatePaths,
    private readonly parser: TemplateParser,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * @throws TemplateNotFoundError when the paths have no source for the name
   * @throws PassthroughCondition when the source is not templated content
   */
  resolve(request: ResolutionRequest): ParsedTemplate {
    const key = resolutionKey(request);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const { identifier, source } = this.readSource(request);
    this.logger.debug("Template cache miss", { key, identifier });

    const parsed = this.parser.parse(source, identifier);
    this.cache.set(key, parsed);
    return parsed;
  }

  has(request: ResolutionRequest): boolean {
    return this.cache.has(resolutionKey(request));
  }

  get size(): number {
    return this.cache.size;
  }

  /** Drop every cached template, e.g. after sources changed. */
  clear(): void {
    this.cache.clear();
  }

  /** Only called on a cache miss: sources are read once per key. */
  private readSource(request: ResolutionRequest): TemplateSource {
    const paths = this.paths;
    switch (request.kind) {
      case TemplateKind.Template: {
        const { controllerName, actionName } = request;
        return {
          identifier: paths.getTemplateIdentifier(controllerName, actionName),
          source: paths.getTemplateSource(controllerName, actionName),
        };
      }
      case TemplateKind.Layout:
        return {
          identifier: paths.getLayoutIdentifier(request.name),
          source: paths.getLayoutSource(request.name),
        };
      case TemplateKind.Partial:
        return {
          identifier: paths.getPartialIdentifier(request.name),
          source: paths.getPartialSource(request.name),
        };
      default:
        return assertNever(request);
    }
  }
}
