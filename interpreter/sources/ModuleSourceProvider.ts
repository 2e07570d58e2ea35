import type { EvaluationUnit } from '@interpreter/core/EvaluationPass';

export interface ModuleSource {
  readonly name: string;
  /** Where the source came from, for messages: a file path or a label */
  readonly origin: string;
  readonly unit: EvaluationUnit;
}

export interface ModuleSourceProvider {
  find(name: string): ModuleSource | undefined;
  /** Locations consulted for `name`, for not-found messages */
  searched?(name: string): string[];
}

/**
 * Sources registered programmatically, for embedding and tests.
 */
export class InMemorySourceProvider implements ModuleSourceProvider {
  private readonly sources = new Map<string, ModuleSource>();

  register(name: string, unit: EvaluationUnit, origin = `memory:${name}`): this {
    this.sources.set(name, { name, origin, unit });
    return this;
  }

  find(name: string): ModuleSource | undefined {
    return this.sources.get(name);
  }
}

/**
 * Asks each provider in turn; the first one that knows the name wins.
 */
export class CompositeSourceProvider implements ModuleSourceProvider {
  constructor(private readonly providers: readonly ModuleSourceProvider[]) {}

  find(name: string): ModuleSource | undefined {
    for (const provider of this.providers) {
      const source = provider.find(name);
      if (source) {
        return source;
      }
    }
    return undefined;
  }

  searched(name: string): string[] {
    return this.providers.flatMap(provider => provider.searched?.(name) ?? []);
  }
}
