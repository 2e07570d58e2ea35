/**
 * Command Context Utilities
 *
 * Builds the runtime, module sources and search roots shared by every CLI
 * command from the parsed options and the merged configuration.
 */

import * as path from 'path';
import { Runtime } from '@interpreter/core/Runtime';
import { ScriptFrontEnd } from '@interpreter/frontend/ScriptFrontEnd';
import { FileSourceProvider } from '@interpreter/sources/FileSourceProvider';
import type { ISyncFileSystem } from '@services/fs/ISyncFileSystem';
import type { ResolvedConfig } from '@core/config/types';
import { loggerFactory, cliLogger } from '@core/utils/logger';
import type { CLIOptions } from '../index';
import type { ErrorHandler } from '../error/ErrorHandler';

export interface CommandContext {
  options: CLIOptions;
  runtime: Runtime;
  frontEnd: ScriptFrontEnd;
  sources: FileSourceProvider;
  fileSystem: ISyncFileSystem;
  /** Absolute module roots, in search order */
  roots: string[];
  currentDir: string;
  errorHandler: ErrorHandler;
}

export interface CommandContextDependencies {
  fileSystem: ISyncFileSystem;
  cwd: string;
  loadConfig: (projectPath: string) => ResolvedConfig;
  errorHandler: ErrorHandler;
}

/**
 * Roots given on the command line replace the configured ones and are
 * resolved against the working directory.
 */
export function getCommandContext(options: CLIOptions, deps: CommandContextDependencies): CommandContext {
  const currentDir = path.resolve(deps.cwd);
  const projectPath = options.configPath ? path.resolve(currentDir, options.configPath) : currentDir;
  const config = deps.loadConfig(projectPath);

  loggerFactory.setLevel(options.debug ? 'debug' : config.logLevel);

  const roots = options.roots.length > 0
    ? options.roots.map(root => path.resolve(currentDir, root))
    : config.roots;

  const frontEnd = new ScriptFrontEnd();
  const sources = new FileSourceProvider(deps.fileSystem, frontEnd, {
    roots,
    extensions: config.extensions
  });
  const runtime = new Runtime({ sources, actionAliases: config.actionAliases });

  cliLogger.debug('Command context ready', {
    command: options.command,
    projectPath,
    roots,
    extensions: config.extensions
  });

  return {
    options,
    runtime,
    frontEnd,
    sources,
    fileSystem: deps.fileSystem,
    roots,
    currentDir,
    errorHandler: deps.errorHandler
  };
}
