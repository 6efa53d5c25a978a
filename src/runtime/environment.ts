/**
 * Variable store for an IMP program. IMP has a single flat scope of
 * integer variables; reading one that was never assigned yields 0.
 */
export class Environment {
  private bindings: Map<string, number>;

  constructor(initial: Record<string, number> = {}) {
    this.bindings = new Map(Object.entries(initial));
  }

  get(name: string): number {
    return this.bindings.get(name) ?? 0;
  }

  set(name: string, value: number): void {
    this.bindings.set(name, value);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * All bindings, sorted by variable name.
   */
  entries(): [string, number][] {
    return [...this.bindings.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  toObject(): Record<string, number> {
    return Object.fromEntries(this.entries());
  }
}
