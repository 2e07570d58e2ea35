import { PassContext, captureLocals } from '@interpreter/env/PassContext';
import type { Namespace } from '@interpreter/env/Namespace';
import { resolveAliases, planRequests } from '@interpreter/eval/aliases';
import type { NamespaceRegistry } from '@core/registry/NamespaceRegistry';
import type { ActionRegistry } from '@core/registry/ActionRegistry';
import type { BaseInitializer, PersistedLocal, RequestTable } from '@core/types/namespace';
import { PassStateError } from '@core/errors/PassStateError';
import { assertNamespaceName } from '@core/utils/identifiers';
import type { ILogger } from '@core/utils/logger';

/**
 * What a front end produces for one form, selection or file: a function
 * that enters a namespace through the pass and then defines into it.
 */
export type EvaluationUnit = (pass: EvaluationPass) => unknown;

export type PassState = 'pending' | 'entered' | 'committed' | 'aborted';

export interface PassResult {
  /** The namespace the pass entered, if it entered one */
  readonly namespace?: Namespace;
  /** Bindings persisted by this pass */
  readonly captured: ReadonlyMap<string, PersistedLocal>;
  /** Whatever the unit returned */
  readonly value: unknown;
}

export interface EvaluationPassDependencies {
  registry: NamespaceRegistry;
  actions: ActionRegistry;
  logger: ILogger;
  origin?: string;
}

/**
 * One evaluation pass. A unit enters exactly one namespace; the runtime then
 * either commits the pass (capture + persist) or aborts it (persist nothing).
 */
export class EvaluationPass {
  private ctx?: PassContext;
  private status: PassState = 'pending';

  constructor(private readonly deps: EvaluationPassDependencies) {}

  get state(): PassState {
    return this.status;
  }

  get origin(): string | undefined {
    return this.deps.origin;
  }

  /**
   * Namespace entry: creates or finds the namespace, resolves the request
   * table and binds the resulting aliases. The table is checked before the
   * namespace is touched, so an unknown action leaves no new namespace.
   */
  enter(name: string, requests: RequestTable = {}, base?: BaseInitializer): PassContext {
    if (this.status !== 'pending') {
      const current = this.ctx?.moduleName;
      throw new PassStateError(
        current
          ? `Pass already entered '${current}'; cannot enter '${name}'`
          : `Cannot enter '${name}': the pass is ${this.status}`,
        current
      );
    }

    assertNamespaceName(name);
    planRequests(name, requests, this.deps.actions);

    const namespace = this.deps.registry.getOrCreate(name, base);
    const ctx = new PassContext(namespace, this.deps.logger);

    for (const [alias, resolution] of resolveAliases(namespace, requests, this.deps.actions)) {
      ctx.bind(alias, resolution.value, resolution.origin);
    }

    this.ctx = ctx;
    this.status = 'entered';
    this.deps.logger.debug('Entered namespace', {
      namespace: name,
      origin: this.deps.origin,
      pass: namespace.passCount + 1
    });

    return ctx;
  }

  /** The context of the entered namespace */
  get context(): PassContext {
    if (!this.ctx) {
      throw new PassStateError('No namespace has been entered in this pass');
    }
    return this.ctx;
  }

  get entered(): boolean {
    return this.ctx !== undefined;
  }

  /** @internal called by the runtime when the unit returns */
  commit(value: unknown): PassResult {
    this.assertOpen('commit');
    const ctx = this.ctx;
    this.status = 'committed';

    if (!ctx) {
      this.deps.logger.debug('Pass entered no namespace; nothing to persist', { origin: this.deps.origin });
      return { captured: new Map(), value };
    }

    const captured = captureLocals(ctx, this.deps.logger);
    ctx.close();
    ctx.namespace.commitLocals(captured);

    return { namespace: ctx.namespace, captured, value };
  }

  /** @internal called by the runtime when the unit throws */
  abort(reason: unknown): void {
    if (this.status === 'committed' || this.status === 'aborted') {
      return;
    }
    this.status = 'aborted';
    this.ctx?.rollbackExports();
    this.ctx?.close();

    this.deps.logger.debug('Pass aborted; exports rolled back, persisted locals left unchanged', {
      namespace: this.ctx?.moduleName,
      origin: this.deps.origin,
      reason: reason instanceof Error ? reason.message : String(reason)
    });
  }

  private assertOpen(operation: string): void {
    if (this.status === 'committed' || this.status === 'aborted') {
      throw new PassStateError(`Cannot ${operation}: the pass has already ${this.status === 'committed' ? 'been committed' : 'been aborted'}`);
    }
  }
}
