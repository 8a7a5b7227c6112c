/**
 * What a rendering frame is currently evaluating.
 */
export enum TemplateKind {
  Template = "template",
  Partial = "partial",
  Layout = "layout",
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
