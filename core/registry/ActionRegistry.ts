import type { ActionHandler } from '@core/types/namespace';

/**
 * Capability table mapping action names used in request tables
 * (`require`, `include`, or anything a caller registers) to handlers.
 * Synonyms map one action name onto another, e.g. `import` → `require`.
 */
export class ActionRegistry {
  private readonly handlers = new Map<string, ActionHandler>();
  private readonly synonyms = new Map<string, string>();

  constructor(synonyms: Readonly<Record<string, string>> = {}) {
    for (const [name, target] of Object.entries(synonyms)) {
      this.synonyms.set(name, target);
    }
  }

  register(name: string, handler: ActionHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  alias(name: string, target: string): this {
    this.synonyms.set(name, target);
    return this;
  }

  /**
   * Finds the handler for `name`, following synonyms. A registered handler
   * shadows a synonym of the same name.
   */
  resolve(name: string): ActionHandler | undefined {
    const direct = this.handlers.get(name);
    if (direct) {
      return direct;
    }

    const seen = new Set<string>([name]);
    let current = this.synonyms.get(name);
    while (current !== undefined && !seen.has(current)) {
      const handler = this.handlers.get(current);
      if (handler) {
        return handler;
      }
      seen.add(current);
      current = this.synonyms.get(current);
    }

    return undefined;
  }

  has(name: string): boolean {
    return this.resolve(name) !== undefined;
  }

  /** Registered action names and synonyms that currently resolve, sorted */
  names(): string[] {
    const names = new Set(this.handlers.keys());
    for (const name of this.synonyms.keys()) {
      if (this.has(name)) {
        names.add(name);
      }
    }
    return Array.from(names).sort();
  }
}
