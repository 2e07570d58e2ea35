/**
 * livens API Entry Point
 *
 * Namespaces with reload-safe state: a runtime that evaluates units into
 * named namespaces, keeps their private bindings across passes, and wires
 * dependencies through pluggable actions.
 */
/// <reference types="node" />
import { Runtime, createRuntime } from '@interpreter/core/Runtime';
import type { RuntimeOptions, EvaluateOptions } from '@interpreter/core/Runtime';
import type { PassResult } from '@interpreter/core/EvaluationPass';
import { ScriptFrontEnd } from '@interpreter/frontend/ScriptFrontEnd';
import { FileSourceProvider } from '@interpreter/sources/FileSourceProvider';
import type { ISyncFileSystem } from '@services/fs/ISyncFileSystem';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';

// Runtime and passes
export { Runtime, createRuntime };
export type { RuntimeOptions, EvaluateOptions };
export { EvaluationPass } from '@interpreter/core/EvaluationPass';
export type { EvaluationUnit, PassResult, PassState } from '@interpreter/core/EvaluationPass';

// Namespaces and capture
export { NamespaceRegistry } from '@core/registry/NamespaceRegistry';
export { ActionRegistry } from '@core/registry/ActionRegistry';
export { Namespace } from '@interpreter/env/Namespace';
export { PassContext, captureLocals } from '@interpreter/env/PassContext';
export type {
  AliasOrigin,
  PersistedLocal,
  PersistedLocals,
  RequestTable,
  BaseValue,
  BaseInitializer,
  ExportsView,
  ActionContext,
  ActionHandler,
  LoadOptions
} from '@core/types/namespace';

// Definition operators and aliases
export {
  define,
  defineOnce,
  defineOnceLazy,
  defineFunction,
  definePrivate,
  defineOncePrivate,
  definePrivateFunction,
  describeFunction
} from '@interpreter/eval/define';
export type { FunctionMetadata } from '@interpreter/eval/define';
export { resolveAliases, planRequests } from '@interpreter/eval/aliases';
export type { AliasResolution } from '@interpreter/eval/aliases';
export { registerBuiltinActions, createAutoload } from '@interpreter/eval/builtin-actions';
export type { ModuleLoader } from '@interpreter/eval/builtin-actions';
export { isValidIdentifier, isValidNamespaceName } from '@core/utils/identifiers';

// Sources and the script front end
export { ScriptFrontEnd, SCRIPT_BUILTINS } from '@interpreter/frontend/ScriptFrontEnd';
export type { CompileOptions } from '@interpreter/frontend/ScriptFrontEnd';
export { InMemorySourceProvider, CompositeSourceProvider } from '@interpreter/sources/ModuleSourceProvider';
export type { ModuleSource, ModuleSourceProvider } from '@interpreter/sources/ModuleSourceProvider';
export { FileSourceProvider };
export type { FileSourceOptions } from '@interpreter/sources/FileSourceProvider';
export type { ISyncFileSystem };
export { NodeFileSystem };

// Configuration and errors
export { ConfigLoader, normalizeConfig } from '@core/config/loader';
export type { LivensConfig, ResolvedConfig, LogLevel } from '@core/config/types';
export * from '@core/errors';

/**
 * Options for a runtime that loads modules from files
 */
export interface FileRuntimeOptions extends Omit<RuntimeOptions, 'sources'> {
  /** Module roots, searched in order [default: cwd] */
  roots?: string[];
  /** Source extensions, tried in order [default: .js] */
  extensions?: string[];
  /** Custom file system implementation */
  fileSystem?: ISyncFileSystem;
}

/**
 * Creates a runtime whose `require` finds `a.b.c` at `<root>/a/b/c.js`.
 */
export function createFileRuntime(options: FileRuntimeOptions = {}): Runtime {
  const { roots, extensions, fileSystem, ...runtimeOptions } = options;
  const sources = new FileSourceProvider(fileSystem ?? new NodeFileSystem(), new ScriptFrontEnd(), {
    roots: roots ?? [process.cwd()],
    extensions: extensions ?? ['.js']
  });
  return new Runtime({ ...runtimeOptions, sources });
}

export interface EvaluateScriptOptions {
  /** Runtime to evaluate in [default: a new file runtime] */
  runtime?: Runtime;
  /** Namespace to evaluate in when the script has no `module(...)` call */
  module?: string;
  /** Label used in stack traces */
  origin?: string;
}

/**
 * Evaluate script source as one pass
 *
 * @example
 * ```ts
 * const runtime = createFileRuntime({ roots: ['src'] });
 * evaluateScript("module('app.main'); def('answer', 42);", { runtime });
 * runtime.lookup('app.main', 'answer'); // 42
 * ```
 */
export function evaluateScript(source: string, options: EvaluateScriptOptions = {}): PassResult {
  const runtime = options.runtime ?? createFileRuntime();
  const origin = options.origin ?? '<script>';
  const unit = new ScriptFrontEnd().compile(source, origin, { defaultModule: options.module });
  return runtime.evaluate(unit, { origin });
}
