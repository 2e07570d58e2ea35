import { version } from '@core/version';
import { ConfigLoader } from '@core/config/loader';
import type { ResolvedConfig } from '@core/config/types';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import type { ISyncFileSystem } from '@services/fs/ISyncFileSystem';
import { ErrorHandler } from './error/ErrorHandler';
import { HelpSystem } from './interaction/HelpSystem';
import { ArgumentParser } from './parsers/ArgumentParser';
import { getCommandContext } from './utils/command-context';
import { evalCommand } from './commands/eval';
import { replCommand } from './commands/repl';
import { watchCommand } from './commands/watch';

export type CommandName = 'eval' | 'repl' | 'watch';

// CLI Options interface
export interface CLIOptions {
  command?: CommandName;
  /** Files or module names following the command */
  inputs: string[];
  /** Module roots from --root, in order */
  roots: string[];
  configPath?: string;
  module?: string;
  debug?: boolean;
  version?: boolean;
  help?: boolean;
}

/** Process-level collaborators, replaceable in tests. */
export interface CLIDependencies {
  fileSystem: ISyncFileSystem;
  cwd: string;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  loadConfig: (projectPath: string) => ResolvedConfig;
  errorHandler: ErrorHandler;
  /** Stops watch mode */
  signal?: AbortSignal;
}

function defaultDependencies(): CLIDependencies {
  return {
    fileSystem: new NodeFileSystem(),
    cwd: process.cwd(),
    input: process.stdin,
    output: process.stdout,
    loadConfig: projectPath => new ConfigLoader(projectPath).resolve(),
    errorHandler: new ErrorHandler()
  };
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function main(args: string[], overrides: Partial<CLIDependencies> = {}): Promise<number> {
  const deps: CLIDependencies = { ...defaultDependencies(), ...overrides };

  let options: CLIOptions;
  try {
    options = new ArgumentParser().parseArgs(args);
  } catch (error) {
    deps.errorHandler.handleError(error);
    return 1;
  }

  if (options.version) {
    console.log(`livens v${version}`);
    return 0;
  }

  if (options.help || !options.command) {
    new HelpSystem().displayHelp(options.command);
    return options.help ? 0 : 1;
  }

  try {
    const context = getCommandContext(options, deps);
    switch (options.command) {
      case 'eval':
        evalCommand(context);
        break;
      case 'repl':
        await replCommand(context, deps.input, deps.output);
        break;
      case 'watch':
        await watchCommand(context, deps.signal);
        break;
    }
    return 0;
  } catch (error) {
    deps.errorHandler.handleError(error, { debug: options.debug });
    return 1;
  }
}
