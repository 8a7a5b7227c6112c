/**
 * Variable storage for rendering contexts.
 */

export type Variables = Readonly<Record<string, unknown>>;

export interface VariableProvider {
  add(key: string, value: unknown): void;
  get(key: string): unknown;
  has(key: string): boolean;
  remove(key: string): void;
  /** Snapshot of every variable; mutating it does not touch the provider. */
  getAll(): Record<string, unknown>;
  /** Independent copy; adding to or removing from it leaves this provider unchanged. */
  clone(): VariableProvider;
  /** New provider seeded from this one, with `overlay` taking precedence. */
  scopeCopyWithOverlay(overlay: Variables): VariableProvider;
}

/**
 * Map-backed provider. Copies share values, never the key table.
 */
export class StandardVariableProvider implements VariableProvider {
  private readonly values: Map<string, unknown>;

  constructor(initial: Variables = {}) {
    this.values = new Map(Object.entries(initial));
  }

  add(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  remove(key: string): void {
    this.values.delete(key);
  }

  getAll(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }

  clone(): StandardVariableProvider {
    return new StandardVariableProvider(this.getAll());
  }

  scopeCopyWithOverlay(overlay: Variables): StandardVariableProvider {
    return new StandardVariableProvider({ ...this.getAll(), ...overlay });
  }
}
