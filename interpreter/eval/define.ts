import type { PassContext } from '@interpreter/env/PassContext';
import { assertIdentifier } from '@core/utils/identifiers';

/**
 * Definition operators. Each one writes through the pass context so the
 * defined name is also a local for the rest of the pass and is captured at
 * its end.
 */

export interface FunctionMetadata {
  /** Fully qualified name, e.g. `app.core/inc` */
  readonly qualifiedName: string;
  readonly name: string;
  readonly namespace: string;
  readonly parameters: readonly string[];
  readonly doc?: string;
}

const functionMetadata = new WeakMap<object, FunctionMetadata>();

export function describeFunction(fn: unknown): FunctionMetadata | undefined {
  return typeof fn === 'function' ? functionMetadata.get(fn) : undefined;
}

/**
 * Exports `name` (overwriting any previous value) and binds it locally.
 */
export function define<T>(ctx: PassContext, name: string, value: T): T {
  assertIdentifier(name, 'export', ctx.moduleName);
  ctx.setExport(name, value);
  ctx.bind(name, value);
  return value;
}

/**
 * Like {@link define}, but only the first definition of `name` ever lands.
 * Later calls bind and return the value already exported.
 */
export function defineOnce(ctx: PassContext, name: string, value: unknown): unknown {
  return defineOnceLazy(ctx, name, () => value);
}

/**
 * {@link defineOnce} for values that must not even be constructed again,
 * such as a started process: `init` only runs when `name` is not exported.
 */
export function defineOnceLazy(ctx: PassContext, name: string, init: () => unknown): unknown {
  assertIdentifier(name, 'export', ctx.moduleName);

  if (ctx.namespace.exports.has(name)) {
    const existing = ctx.namespace.exports.get(name);
    ctx.logger.debug('Kept existing definition', { namespace: ctx.moduleName, name });
    ctx.bind(name, existing);
    return existing;
  }

  return define(ctx, name, init());
}

export function defineFunction<A extends unknown[], R>(
  ctx: PassContext,
  name: string,
  parameters: readonly string[],
  body: (...args: A) => R,
  doc?: string
): (...args: A) => R {
  return define(ctx, name, makeCallable(ctx, name, parameters, body, doc));
}

/** Binds `name` for this and later passes without exporting it. */
export function definePrivate<T>(ctx: PassContext, name: string, value: T): T {
  assertIdentifier(name, 'local', ctx.moduleName);
  ctx.bind(name, value);
  return value;
}

/**
 * Private counterpart of {@link defineOnce}: skipped when the name is
 * already bound in this pass or persisted from an earlier one.
 */
export function defineOncePrivate(ctx: PassContext, name: string, value: unknown): unknown {
  assertIdentifier(name, 'local', ctx.moduleName);

  if (ctx.isBound(name)) {
    return ctx.get(name);
  }

  const persisted = ctx.namespace.persistedLocals.get(name);
  if (persisted) {
    ctx.bind(name, persisted.value, persisted.origin);
    return persisted.value;
  }

  return definePrivate(ctx, name, value);
}

export function definePrivateFunction<A extends unknown[], R>(
  ctx: PassContext,
  name: string,
  parameters: readonly string[],
  body: (...args: A) => R,
  doc?: string
): (...args: A) => R {
  return definePrivate(ctx, name, makeCallable(ctx, name, parameters, body, doc));
}

function makeCallable<A extends unknown[], R>(
  ctx: PassContext,
  name: string,
  parameters: readonly string[],
  body: (...args: A) => R,
  doc?: string
): (...args: A) => R {
  const qualifiedName = `${ctx.moduleName}/${name}`;
  const callable = (...args: A): R => body(...args);

  Object.defineProperty(callable, 'name', { value: qualifiedName });
  functionMetadata.set(callable, {
    qualifiedName,
    name,
    namespace: ctx.moduleName,
    parameters: [...parameters],
    doc
  });

  return callable;
}
