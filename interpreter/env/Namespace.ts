import { types } from 'util';
import type {
  BaseValue,
  ExportsView,
  PersistedLocal,
  PersistedLocals
} from '@core/types/namespace';

/**
 * The persistent object backing one named module.
 *
 * `exports` is mutated in place by definition operators (and put back by the
 * pass context when a pass aborts). The persisted
 * locals are only ever replaced as a whole, by {@link Namespace.commitLocals}
 * at the end of a successful pass, so an aborted pass cannot leave a
 * half-written slot behind.
 */
export class Namespace {
  readonly name: string;
  readonly exports = new Map<string, unknown>();

  private locals: PersistedLocals = new Map();
  private committedPasses = 0;
  private view?: ExportsView;

  constructor(name: string, base?: BaseValue) {
    this.name = name;

    if (base) {
      for (const [key, value] of baseEntries(base)) {
        this.exports.set(key, value);
      }
    }
  }

  get persistedLocals(): PersistedLocals {
    return this.locals;
  }

  /** Number of passes committed against this namespace */
  get passCount(): number {
    return this.committedPasses;
  }

  get loaded(): boolean {
    return this.committedPasses > 0;
  }

  hasExport(name: string): boolean {
    return this.exports.has(name);
  }

  getExport(name: string): unknown {
    return this.exports.get(name);
  }

  /**
   * Merges a pass's captured bindings over the previous persisted locals and
   * swaps the result in.
   */
  commitLocals(captured: ReadonlyMap<string, PersistedLocal>): void {
    const merged = new Map(this.locals);
    for (const [name, local] of captured) {
      merged.set(name, local);
    }
    this.locals = merged;
    this.committedPasses++;
  }

  /**
   * Stable, read-only object whose properties track `exports`. This is what
   * other modules receive when they require this one.
   */
  get exportsView(): ExportsView {
    if (!this.view) {
      this.view = createExportsView(this.exports);
    }
    return this.view;
  }
}

// types.isMap also recognises maps created in another realm, such as a vm context
function isBaseMap(base: BaseValue): base is ReadonlyMap<string, unknown> {
  return types.isMap(base);
}

function baseEntries(base: BaseValue): Iterable<[string, unknown]> {
  return isBaseMap(base) ? base.entries() : Object.entries(base);
}

function createExportsView(exports: Map<string, unknown>): ExportsView {
  const target: Record<string, unknown> = Object.create(null);

  return new Proxy(target, {
    get: (_target, key) => (typeof key === 'string' ? exports.get(key) : undefined),
    has: (_target, key) => typeof key === 'string' && exports.has(key),
    ownKeys: () => Array.from(exports.keys()),
    getOwnPropertyDescriptor: (_target, key) => {
      if (typeof key !== 'string' || !exports.has(key)) {
        return undefined;
      }
      return { value: exports.get(key), enumerable: true, configurable: true, writable: false };
    },
    set: () => false,
    deleteProperty: () => false,
    defineProperty: () => false
  });
}
