/**
 * Shared types for namespaces, alias requests and evaluation units.
 */

/** Where an alias-derived local came from. */
export interface AliasOrigin {
  readonly action: string;
  readonly target: string;
}

/**
 * A local binding as persisted on a namespace between passes. `origin` is
 * set only for bindings produced by alias resolution.
 */
export interface PersistedLocal {
  readonly value: unknown;
  readonly origin?: AliasOrigin;
}

export type PersistedLocals = ReadonlyMap<string, PersistedLocal>;

/**
 * action → (alias → target). Action names are open; any name registered
 * with the action registry may appear.
 */
export type RequestTable = Readonly<Record<string, Readonly<Record<string, string>>>>;

export type BaseValue = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

/** A base value, or a thunk computed only when the namespace is created. */
export type BaseInitializer = BaseValue | (() => BaseValue);

/** Read-only, live view over a namespace's exports. */
export type ExportsView = Readonly<Record<string, unknown>>;

export interface ActionContext {
  /** Alias the result will be bound to */
  readonly alias: string;
  /** Namespace whose pass issued the request */
  readonly requester: string;
}

export type ActionHandler = (target: string, context: ActionContext) => unknown;

export interface LoadOptions {
  /** Re-evaluate the module's source even if it is already loaded */
  fresh?: boolean;
  requester?: string;
}
