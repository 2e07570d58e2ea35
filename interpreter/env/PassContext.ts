import type { Namespace } from './Namespace';
import { PassStateError } from '@core/errors/PassStateError';
import { CaptureDegradation } from '@core/errors/CaptureDegradation';
import { passLogger } from '@core/utils/logger';
import type { ILogger } from '@core/utils/logger';
import type { AliasOrigin, PersistedLocal } from '@core/types/namespace';

/**
 * The frame of one evaluation pass against one namespace.
 *
 * Every local the pass introduces (resolved aliases, definitions, front-end
 * locals) is recorded here with {@link PassContext.bind}; at the end of the
 * pass the runtime hands these bindings to the namespace. Once closed the
 * context rejects new bindings and yields nothing to capture.
 */
export class PassContext {
  readonly namespace: Namespace;

  private readonly bindings = new Map<string, PersistedLocal>();
  // Export values as they were before this pass first wrote each name
  private readonly priorExports = new Map<string, { present: boolean; value: unknown }>();
  private closed = false;

  constructor(namespace: Namespace, readonly logger: ILogger = passLogger) {
    this.namespace = namespace;
  }

  get moduleName(): string {
    return this.namespace.name;
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /** Binds (or rebinds) a local for the rest of the pass. */
  bind(name: string, value: unknown, origin?: AliasOrigin): void {
    if (this.closed) {
      throw new PassStateError(`Cannot bind '${name}': the pass over '${this.moduleName}' has ended`, this.moduleName);
    }
    this.bindings.set(name, origin ? { value, origin } : { value });
  }

  /** Writes an export, remembering the previous value for {@link rollbackExports}. */
  setExport(name: string, value: unknown): void {
    if (this.closed) {
      throw new PassStateError(`Cannot export '${name}': the pass over '${this.moduleName}' has ended`, this.moduleName);
    }
    if (!this.priorExports.has(name)) {
      this.priorExports.set(name, {
        present: this.namespace.exports.has(name),
        value: this.namespace.exports.get(name)
      });
    }
    this.namespace.exports.set(name, value);
  }

  /**
   * Puts back every export this pass wrote, leaving the namespace as the
   * last committed pass left it. Called when the pass aborts.
   */
  rollbackExports(): void {
    for (const [name, prior] of this.priorExports) {
      if (prior.present) {
        this.namespace.exports.set(name, prior.value);
      } else {
        this.namespace.exports.delete(name);
      }
    }
    this.priorExports.clear();
  }

  /** True when the name is bound in this pass */
  isBound(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * Resolves a name the way code in the pass sees it: this pass's bindings,
   * then locals persisted by earlier passes, then the namespace's exports.
   */
  get(name: string): unknown {
    const local = this.bindings.get(name) ?? this.namespace.persistedLocals.get(name);
    if (local) {
      return local.value;
    }
    return this.namespace.exports.get(name);
  }

  has(name: string): boolean {
    return (
      this.bindings.has(name) ||
      this.namespace.persistedLocals.has(name) ||
      this.namespace.exports.has(name)
    );
  }

  /** Names bound in this pass, in binding order */
  boundNames(): string[] {
    return Array.from(this.bindings.keys());
  }

  /** Names visible to the pass, in lookup precedence order (exports last) */
  visibleNames(): string[] {
    const names = new Set<string>(this.bindings.keys());
    for (const name of this.namespace.persistedLocals.keys()) names.add(name);
    for (const name of this.namespace.exports.keys()) names.add(name);
    return Array.from(names);
  }

  /** @internal used by {@link captureLocals} */
  snapshot(): Map<string, PersistedLocal> | undefined {
    return this.closed ? undefined : new Map(this.bindings);
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.logger.debug('Pass context closed', {
        namespace: this.moduleName,
        bindings: this.bindings.size
      });
    }
  }
}

/**
 * Returns every binding the pass introduced. A missing or torn-down frame
 * yields an empty mapping and a logged {@link CaptureDegradation}.
 */
export function captureLocals(frame: PassContext | undefined, logger: ILogger = passLogger): Map<string, PersistedLocal> {
  if (!frame) {
    const degradation = new CaptureDegradation('no pass context');
    logger.warn(degradation.message, degradation.toJSON());
    return new Map();
  }

  const snapshot = frame.snapshot();
  if (!snapshot) {
    const degradation = new CaptureDegradation('pass context already closed', frame.moduleName);
    logger.warn(degradation.message, degradation.toJSON());
    return new Map();
  }

  return snapshot;
}
