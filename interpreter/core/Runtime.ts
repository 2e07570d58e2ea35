import { EvaluationPass } from './EvaluationPass';
import type { EvaluationUnit, PassResult } from './EvaluationPass';
import type { PassContext } from '@interpreter/env/PassContext';
import type { Namespace } from '@interpreter/env/Namespace';
import { registerBuiltinActions } from '@interpreter/eval/builtin-actions';
import type { ModuleLoader } from '@interpreter/eval/builtin-actions';
import type { ModuleSourceProvider } from '@interpreter/sources/ModuleSourceProvider';
import { NamespaceRegistry } from '@core/registry/NamespaceRegistry';
import { ActionRegistry } from '@core/registry/ActionRegistry';
import type { LoadOptions } from '@core/types/namespace';
import { CircularRequireError } from '@core/errors/CircularRequireError';
import { ModuleNotFoundError } from '@core/errors/ModuleNotFoundError';
import { passLogger, loaderLogger } from '@core/utils/logger';
import type { ILogger } from '@core/utils/logger';

export interface RuntimeOptions {
  registry?: NamespaceRegistry;
  /** Defaults to a registry with the built-in actions */
  actions?: ActionRegistry;
  /** Synonyms added to the action registry, e.g. `{ import: 'require' }` */
  actionAliases?: Readonly<Record<string, string>>;
  sources?: ModuleSourceProvider;
  logger?: ILogger;
  loaderLogger?: ILogger;
}

export interface EvaluateOptions {
  /** File path or label of the evaluated source */
  origin?: string;
}

/**
 * Owns the namespace registry and the action table for one process and runs
 * evaluation passes against them. Passes run one at a time; they nest only
 * when a `require` loads a module that has not been evaluated yet.
 */
export class Runtime implements ModuleLoader {
  readonly registry: NamespaceRegistry;
  readonly actions: ActionRegistry;

  private readonly sources?: ModuleSourceProvider;
  private readonly logger: ILogger;
  private readonly loaderLogger: ILogger;
  private readonly loading: string[] = [];

  constructor(options: RuntimeOptions = {}) {
    this.registry = options.registry ?? new NamespaceRegistry();
    this.actions = options.actions ?? registerBuiltinActions(new ActionRegistry(), this);
    for (const [name, target] of Object.entries(options.actionAliases ?? {})) {
      this.actions.alias(name, target);
    }
    this.sources = options.sources;
    this.logger = options.logger ?? passLogger;
    this.loaderLogger = options.loaderLogger ?? loaderLogger;
  }

  /**
   * Runs one pass. On return the pass's bindings are persisted on the entered
   * namespace; if the unit throws, nothing is persisted and the error is
   * rethrown unchanged.
   */
  evaluate(unit: EvaluationUnit, options: EvaluateOptions = {}): PassResult {
    const pass = new EvaluationPass({
      registry: this.registry,
      actions: this.actions,
      logger: this.logger,
      origin: options.origin
    });

    let value: unknown;
    try {
      value = unit(pass);
    } catch (error) {
      pass.abort(error);
      throw error;
    }

    return pass.commit(value);
  }

  /**
   * Form-at-a-time evaluation: re-enters `name` with an empty request table,
   * which restores the aliases of earlier passes, and runs `form` against it.
   */
  evaluateIn(name: string, form: (ctx: PassContext) => unknown, options: EvaluateOptions = {}): PassResult {
    return this.evaluate(pass => form(pass.enter(name)), options);
  }

  /**
   * Returns the namespace for `name`, evaluating its source first when it has
   * not been loaded (or always, with `fresh`).
   */
  load(name: string, options: LoadOptions = {}): Namespace {
    const existing = this.registry.get(name);
    if (existing?.loaded && !options.fresh) {
      return existing;
    }

    if (this.loading.includes(name)) {
      throw new CircularRequireError([...this.loading.slice(this.loading.indexOf(name)), name]);
    }

    const source = this.sources?.find(name);
    if (!source) {
      if (existing && !options.fresh) {
        return existing;
      }
      throw ModuleNotFoundError.noSource(name, this.sources?.searched?.(name) ?? []);
    }

    this.loaderLogger.debug('Loading module', {
      namespace: name,
      origin: source.origin,
      requester: options.requester,
      fresh: options.fresh === true
    });

    this.loading.push(name);
    let result: PassResult;
    try {
      result = this.evaluate(source.unit, { origin: source.origin });
    } finally {
      this.loading.pop();
    }

    // The registry may already hold `name` from an aborted pass; only the pass itself counts
    const namespace = result.namespace;
    if (!namespace || namespace.name !== name) {
      throw ModuleNotFoundError.notDeclared(name, source.origin);
    }
    return namespace;
  }

  /** Exported value lookup by namespace and name */
  lookup(namespace: string, name: string): unknown {
    return this.registry.get(namespace)?.getExport(name);
  }
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  return new Runtime(options);
}
