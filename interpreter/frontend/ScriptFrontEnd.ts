import * as vm from 'vm';
import { types } from 'util';
import type { EvaluationPass, EvaluationUnit } from '@interpreter/core/EvaluationPass';
import type { PassContext } from '@interpreter/env/PassContext';
import {
  define,
  defineOnce,
  defineOnceLazy,
  defineFunction,
  definePrivate,
  defineOncePrivate,
  definePrivateFunction
} from '@interpreter/eval/define';
import type { BaseInitializer, BaseValue, RequestTable } from '@core/types/namespace';
import { PassStateError } from '@core/errors/PassStateError';
import { ConfigurationError } from '@core/errors/ConfigurationError';
import { isValidIdentifier } from '@core/utils/identifiers';
import { frontendLogger } from '@core/utils/logger';
import type { ILogger } from '@core/utils/logger';

export interface CompileOptions {
  /**
   * Enter this namespace before the script runs. Used for form-at-a-time
   * evaluation of snippets that carry no `module(...)` header.
   */
  defaultModule?: string;
}

type Callable = (...args: unknown[]) => unknown;

/** Globals every script sees; never captured as locals. */
export const SCRIPT_BUILTINS = [
  'module',
  'def',
  'defonce',
  'defonceWith',
  'defn',
  'defPrivate',
  'defoncePrivate',
  'defnPrivate',
  'console'
] as const;

const builtinNames = new Set<string>(SCRIPT_BUILTINS);

/**
 * Turns JavaScript source into evaluation units.
 *
 * ```js
 * module('app.main', { require: { util: 'app.util' } });
 * def('answer', util.inc(41));
 * defn('greet', ['who'], who => `hello ${who}`);
 * var scratch = 1; // captured as a local
 * ```
 *
 * The script is compiled once; each run gets a fresh context whose globals
 * act as the pass's frame. Globals the script creates or reassigns are bound
 * into the pass context when it finishes.
 */
export class ScriptFrontEnd {
  constructor(private readonly logger: ILogger = frontendLogger) {}

  compile(source: string, origin: string, options: CompileOptions = {}): EvaluationUnit {
    const script = new vm.Script(source, { filename: origin });

    return (pass: EvaluationPass) => {
      const frame = new ScriptFrame(pass, this.logger);
      if (options.defaultModule) {
        frame.enter(options.defaultModule, {}, undefined, true);
      }

      const value = script.runInContext(frame.context, { filename: origin });
      frame.captureGlobals();
      return value;
    };
  }
}

class ScriptFrame {
  readonly context: vm.Context;
  private readonly seeded = new Map<string, unknown>();
  private implicitEntry = false;

  constructor(private readonly pass: EvaluationPass, private readonly logger: ILogger) {
    this.context = vm.createContext({
      console,
      module: (name: unknown, requests?: unknown, base?: unknown) => {
        this.enter(requireString(name, 'module name'), toRequestTable(requests), toBase(base), false);
      },
      def: (name: unknown, value: unknown) => this.set(name, define(this.ctx(), requireString(name, 'name'), value)),
      defonce: (name: unknown, value: unknown) => this.set(name, defineOnce(this.ctx(), requireString(name, 'name'), value)),
      defonceWith: (name: unknown, init: unknown) =>
        this.set(name, defineOnceLazy(this.ctx(), requireString(name, 'name'), () => requireFunction(init, 'initializer')())),
      defn: (name: unknown, parameters: unknown, body: unknown, doc?: unknown) =>
        this.set(name, defineFunction(this.ctx(), requireString(name, 'name'), toParameters(parameters), requireFunction(body, 'function body'), toDoc(doc))),
      defPrivate: (name: unknown, value: unknown) => this.set(name, definePrivate(this.ctx(), requireString(name, 'name'), value)),
      defoncePrivate: (name: unknown, value: unknown) =>
        this.set(name, defineOncePrivate(this.ctx(), requireString(name, 'name'), value)),
      defnPrivate: (name: unknown, parameters: unknown, body: unknown, doc?: unknown) =>
        this.set(name, definePrivateFunction(this.ctx(), requireString(name, 'name'), toParameters(parameters), requireFunction(body, 'function body'), toDoc(doc)))
    });
  }

  enter(name: string, requests: RequestTable, base: BaseInitializer | undefined, implicit: boolean): void {
    if (this.implicitEntry && !implicit) {
      throw new PassStateError(
        `module('${name}') is not allowed here: this form is evaluated inside '${this.pass.context.moduleName}'`,
        this.pass.context.moduleName
      );
    }

    const ctx = this.pass.enter(name, requests, base);
    this.implicitEntry = implicit;

    // Lowest precedence first so later writes shadow earlier ones
    for (const [key, value] of ctx.namespace.exports) this.seed(key, value);
    for (const [key, local] of ctx.namespace.persistedLocals) this.seed(key, local.value);
    for (const key of ctx.boundNames()) this.seed(key, ctx.get(key));
  }

  /** Binds every global the script added or reassigned. */
  captureGlobals(): void {
    if (!this.pass.entered) {
      return;
    }
    const ctx = this.pass.context;

    for (const key of Object.keys(this.context)) {
      if (builtinNames.has(key)) {
        continue;
      }
      const value: unknown = this.context[key];
      if (this.seeded.has(key) && Object.is(this.seeded.get(key), value)) {
        continue;
      }
      ctx.bind(key, value);
    }
  }

  private ctx(): PassContext {
    return this.pass.context;
  }

  private seed(key: string, value: unknown): void {
    if (!isValidIdentifier(key)) {
      this.logger.debug('Not exposing binding that is not a script identifier', { name: key });
      return;
    }
    if (builtinNames.has(key)) {
      this.logger.debug('Not exposing binding that shadows a script builtin', { name: key });
      return;
    }
    this.context[key] = value;
    this.seeded.set(key, value);
  }

  private set(name: unknown, value: unknown): unknown {
    if (typeof name === 'string') {
      this.seed(name, value);
    }
    return value;
  }
}

function requireString(value: unknown, what: string): string {
  if (typeof value !== 'string') {
    throw new ConfigurationError(`Expected ${what} to be a string, got ${typeof value}`);
  }
  return value;
}

function requireFunction(value: unknown, what: string): Callable {
  if (typeof value !== 'function') {
    throw new ConfigurationError(`Expected ${what} to be a function, got ${typeof value}`);
  }
  return (...args: unknown[]) => Reflect.apply(value, undefined, args);
}

function toParameters(value: unknown): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ConfigurationError('Expected parameters to be an array of names');
  }
  return value.map(String);
}

function toDoc(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRequestTable(value: unknown): RequestTable {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError('Expected the request table to be an object');
  }

  const table: Record<string, Record<string, string>> = {};
  for (const [action, aliases] of Object.entries(value)) {
    if (!isRecord(aliases)) {
      throw new ConfigurationError(`Expected the '${action}' request to map aliases to module names`, { action });
    }
    table[action] = {};
    for (const [alias, target] of Object.entries(aliases)) {
      table[action][alias] = requireString(target, `target of alias '${alias}'`);
    }
  }
  return table;
}

function toBase(value: unknown): BaseInitializer | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'function') {
    return () => toBaseValue(Reflect.apply(value, undefined, []), 'the base initializer to return');
  }
  return toBaseValue(value, 'the module base to be');
}

/** Maps from the script's realm are copied into a map keyed by name. */
function toBaseValue(value: unknown, what: string): BaseValue {
  if (types.isMap(value)) {
    const entries = new Map<string, unknown>();
    for (const [key, entry] of value) {
      entries.set(requireString(key, 'base key'), entry);
    }
    return entries;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`Expected ${what} an object or a Map`);
  }
  return value;
}
