import * as path from 'path';
import * as readline from 'readline';
import { inspect } from 'util';
import { assertNamespaceName } from '@core/utils/identifiers';
import { CommandUsageError } from '@core/errors/CommandUsageError';
import type { CommandContext } from '../utils/command-context';

export const DEFAULT_REPL_MODULE = 'user';

const REPL_HELP = [
  ':in <module>   switch the current module',
  ':load <file>   evaluate a file and switch to the module it entered',
  ':exports       list the exports of the current module',
  ':quit          leave the REPL'
].join('\n');

/**
 * Line-at-a-time evaluation. Every line is its own pass inside the current
 * module, so `var` bindings and aliases carry over between lines.
 */
export class ReplSession {
  private current: string;
  private counter = 0;
  private quit = false;

  constructor(private readonly context: CommandContext, initialModule = DEFAULT_REPL_MODULE) {
    assertNamespaceName(initialModule);
    this.current = initialModule;
  }

  get module(): string {
    return this.current;
  }

  get closed(): boolean {
    return this.quit;
  }

  get prompt(): string {
    return `${this.current}=> `;
  }

  /** Returns the text to print for `line`, if any. Errors are formatted, not thrown. */
  handle(line: string): string | undefined {
    const trimmed = line.trim();
    if (!trimmed) {
      return undefined;
    }

    try {
      return trimmed.startsWith(':') ? this.command(trimmed) : this.evaluate(line);
    } catch (error) {
      return this.context.errorHandler.format(error, { debug: this.context.options.debug });
    }
  }

  private command(line: string): string | undefined {
    const [command, ...rest] = line.split(/\s+/);
    const argument = rest.join(' ');

    switch (command) {
      case ':quit':
      case ':q':
        this.quit = true;
        return undefined;
      case ':in':
        assertNamespaceName(argument);
        this.current = argument;
        return undefined;
      case ':load':
        return this.load(argument);
      case ':exports': {
        const names = [...(this.context.runtime.registry.get(this.current)?.exports.keys() ?? [])];
        return names.length > 0 ? names.join('\n') : '(no exports)';
      }
      case ':help':
        return REPL_HELP;
      default:
        throw new CommandUsageError(`Unknown REPL command: ${command} (try :help)`, command);
    }
  }

  private load(file: string): string {
    if (!file) {
      throw new CommandUsageError(':load needs a file', ':load');
    }
    const source = this.context.sources.fromFile(path.resolve(this.context.currentDir, file));
    const result = this.context.runtime.evaluate(source.unit, { origin: source.origin });
    if (!result.namespace) {
      return `loaded ${source.origin}`;
    }
    this.current = result.namespace.name;
    return `loaded ${source.origin} into ${result.namespace.name}`;
  }

  private evaluate(source: string): string {
    const origin = `repl:${++this.counter}`;
    const unit = this.context.frontEnd.compile(source, origin, { defaultModule: this.current });
    const result = this.context.runtime.evaluate(unit, { origin });
    return inspect(result.value, { depth: 2 });
  }
}

export async function replCommand(
  context: CommandContext,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Promise<void> {
  const session = new ReplSession(context, context.options.module);
  const rl = readline.createInterface({ input, output });

  rl.setPrompt(session.prompt);
  rl.prompt();

  // Leaving the loop closes the interface
  for await (const line of rl) {
    const result = session.handle(line);
    if (result !== undefined) {
      output.write(result + '\n');
    }
    if (session.closed) {
      break;
    }
    rl.setPrompt(session.prompt);
    rl.prompt();
  }
}
