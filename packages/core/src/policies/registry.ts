import { DomainError } from "@constant-synthesis/shared";

export interface PolicyDefinition<TEvaluate> {
  id: string;
  description?: string;
  evaluate: TEvaluate;
}

/**
 * Named strategy lookup. Each registry instance owns its definitions, so a
 * policy registered in one synthesizer never leaks into another.
 */
export class PolicyRegistry<TEvaluate> {
  private readonly definitions = new Map<string, PolicyDefinition<TEvaluate>>();

  constructor(
    readonly kind: string,
    defaults: ReadonlyArray<PolicyDefinition<TEvaluate>> = []
  ) {
    defaults.forEach(def => this.register(def));
  }

  find(id: string): PolicyDefinition<TEvaluate> | undefined {
    return this.definitions.get(id);
  }

  get(id: string): PolicyDefinition<TEvaluate> {
    const def = this.definitions.get(id);
    if (!def) {
      throw new DomainError(`${this.kind} policy`, id, `expected one of ${this.ids().join(", ")}`);
    }
    return def;
  }

  list(): PolicyDefinition<TEvaluate>[] {
    return Array.from(this.definitions.values());
  }

  ids(): string[] {
    return Array.from(this.definitions.keys());
  }

  register(def: PolicyDefinition<TEvaluate>): void {
    if (!def.id.trim()) {
      throw new DomainError(`${this.kind} policy`, def.id, "expected a non-empty id");
    }
    this.definitions.set(def.id, def);
  }
}
