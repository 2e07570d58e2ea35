import { Namespace } from '@interpreter/env/Namespace';
import { assertNamespaceName } from '@core/utils/identifiers';
import { registryLogger } from '@core/utils/logger';
import type { ILogger } from '@core/utils/logger';
import type { BaseInitializer, BaseValue } from '@core/types/namespace';

/**
 * Table of live namespaces, one per name. Entries are added on first
 * reference and never removed; the registry lives as long as the runtime
 * that owns it.
 */
export class NamespaceRegistry {
  private readonly namespaces = new Map<string, Namespace>();

  constructor(private readonly logger: ILogger = registryLogger) {}

  /**
   * Returns the namespace registered under `name`, creating it first if
   * needed. `base` is only consulted on creation.
   */
  getOrCreate(name: string, base?: BaseInitializer): Namespace {
    const existing = this.namespaces.get(name);
    if (existing) {
      return existing;
    }

    assertNamespaceName(name);

    // Computed before registering so a throwing base leaves no entry
    const initial = base === undefined ? undefined : computeBase(base);
    const namespace = new Namespace(name, initial);
    this.namespaces.set(name, namespace);

    this.logger.debug('Created namespace', {
      namespace: name,
      baseExports: namespace.exports.size
    });

    return namespace;
  }

  get(name: string): Namespace | undefined {
    return this.namespaces.get(name);
  }

  has(name: string): boolean {
    return this.namespaces.has(name);
  }

  names(): string[] {
    return Array.from(this.namespaces.keys());
  }

  get size(): number {
    return this.namespaces.size;
  }
}

function computeBase(base: BaseInitializer): BaseValue {
  return typeof base === 'function' ? base() : base;
}
