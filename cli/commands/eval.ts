import * as path from 'path';
import chalk from 'chalk';
import { CommandUsageError } from '@core/errors/CommandUsageError';
import type { CommandContext } from '../utils/command-context';

export interface EvalResult {
  input: string;
  /** The namespace the source entered, if any */
  namespace?: string;
  exports: string[];
  value: unknown;
}

/**
 * Evaluates each input in order. An input naming an existing file is
 * evaluated as a script; anything else is taken as a module name and loaded
 * from the module roots.
 */
export function evalCommand(context: CommandContext): EvalResult[] {
  if (context.options.inputs.length === 0) {
    throw new CommandUsageError('eval needs at least one file or module name', 'eval');
  }

  return context.options.inputs.map(input => {
    const result = evaluateInput(context, input);
    console.log(formatEvalResult(result));
    return result;
  });
}

export function evaluateInput(context: CommandContext, input: string): EvalResult {
  const { runtime, sources, fileSystem, currentDir } = context;
  const filePath = path.resolve(currentDir, input);

  if (fileSystem.isFileSync(filePath)) {
    const source = sources.fromFile(filePath);
    const result = runtime.evaluate(source.unit, { origin: source.origin });
    return {
      input,
      namespace: result.namespace?.name,
      exports: result.namespace ? [...result.namespace.exports.keys()] : [],
      value: result.value
    };
  }

  const namespace = runtime.load(input, { requester: 'cli' });
  return {
    input,
    namespace: namespace.name,
    exports: [...namespace.exports.keys()],
    value: undefined
  };
}

function formatEvalResult(result: EvalResult): string {
  if (!result.namespace) {
    return `${chalk.yellow('•')} ${result.input} ${chalk.gray('(no namespace entered)')}`;
  }
  const exported = result.exports.length > 0 ? result.exports.join(', ') : 'no exports';
  return `${chalk.green('✓')} ${result.namespace} ${chalk.gray(`(${exported})`)}`;
}
