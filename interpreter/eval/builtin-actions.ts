import type { ActionRegistry } from '@core/registry/ActionRegistry';
import type { ExportsView, LoadOptions } from '@core/types/namespace';
import type { Namespace } from '@interpreter/env/Namespace';

export interface ModuleLoader {
  load(name: string, options?: LoadOptions): Namespace;
}

/**
 * `require`: the module's exports, loading it on first use only.
 * `include`: re-evaluates the module's source on every request.
 * `autoload`: defers `require` until a property is first read.
 */
export function registerBuiltinActions(actions: ActionRegistry, loader: ModuleLoader): ActionRegistry {
  return actions
    .register('require', (target, { requester }) => loader.load(target, { requester }).exportsView)
    .register('include', (target, { requester }) => loader.load(target, { requester, fresh: true }).exportsView)
    .register('autoload', (target, { requester }) =>
      createAutoload(() => loader.load(target, { requester }).exportsView)
    );
}

/**
 * A stand-in for a module's exports that loads the module the first time it
 * is looked into.
 */
export function createAutoload(load: () => ExportsView): ExportsView {
  let resolved: ExportsView | undefined;
  const resolve = (): ExportsView => {
    if (!resolved) {
      resolved = load();
    }
    return resolved;
  };

  const target: Record<string, unknown> = Object.create(null);

  return new Proxy(target, {
    get: (_target, key) => Reflect.get(resolve(), key),
    has: (_target, key) => Reflect.has(resolve(), key),
    ownKeys: () => Reflect.ownKeys(resolve()),
    getOwnPropertyDescriptor: (_target, key) => Reflect.getOwnPropertyDescriptor(resolve(), key),
    set: () => false,
    deleteProperty: () => false,
    defineProperty: () => false
  });
}
