import type { CLIOptions, CommandName } from '../index';
import { CommandUsageError } from '@core/errors/CommandUsageError';

const COMMANDS: readonly CommandName[] = ['eval', 'repl', 'watch'];

function isCommand(value: string): value is CommandName {
  return COMMANDS.some(command => command === value);
}

export class ArgumentParser {
  parseArgs(args: string[]): CLIOptions {
    const options: CLIOptions = {
      inputs: [],
      roots: []
    };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      switch (arg) {
        case '--version':
        case '-V':
          options.version = true;
          break;
        case '--help':
        case '-h':
          options.help = true;
          break;
        case '--debug':
        case '-d':
          options.debug = true;
          break;
        case '--root':
        case '-r':
          options.roots.push(this.takeValue(args, ++i, arg));
          break;
        case '--config':
        case '-c':
          options.configPath = this.takeValue(args, ++i, arg);
          break;
        case '--module':
        case '-m':
          options.module = this.takeValue(args, ++i, arg);
          break;
        default:
          if (arg.startsWith('-')) {
            throw new CommandUsageError(`Unknown option: ${arg}`);
          }
          if (options.command) {
            options.inputs.push(arg);
          } else if (isCommand(arg)) {
            options.command = arg;
          } else {
            throw new CommandUsageError(`Unknown command: ${arg} (expected one of ${COMMANDS.join(', ')})`);
          }
      }
    }

    return options;
  }

  private takeValue(args: string[], index: number, flag: string): string {
    const value = args[index];
    if (value === undefined || value.startsWith('-')) {
      throw new CommandUsageError(`${flag} requires a value`);
    }
    return value;
  }
}
