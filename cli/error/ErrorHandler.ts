import { types } from 'util';
import chalk from 'chalk';
import { LivensError, ErrorSeverity } from '@core/errors/LivensError';
import { cliLogger } from '@core/utils/logger';
import type { ILogger } from '@core/utils/logger';

export interface ErrorDisplayOptions {
  /** Append stack traces */
  debug?: boolean;
}

export class ErrorHandler {
  constructor(private readonly logger: ILogger = cliLogger) {}

  /** Prints the error to stderr. */
  handleError(error: unknown, options: ErrorDisplayOptions = {}): void {
    if (error instanceof LivensError) {
      this.logger.debug('Command failed', error.toJSON());
    } else {
      this.logger.debug('Command failed', { error: String(error) });
    }
    console.error('\n' + this.format(error, options) + '\n');
  }

  format(error: unknown, options: ErrorDisplayOptions = {}): string {
    const lines: string[] = [];

    if (error instanceof LivensError) {
      lines.push('  ⎿  ' + this.severityLabel(error.severity) + error.message);
      lines.push(chalk.gray(`     [${error.code}]`));
    } else if (types.isNativeError(error)) {
      // Script errors come from another realm, so no instanceof Error here
      lines.push('  ⎿  ' + chalk.red(`${error.name}: `) + error.message);
    } else {
      lines.push(chalk.red(`Unknown Error: ${String(error)}`));
      return lines.join('\n');
    }

    const cause: unknown = error.cause;
    if (types.isNativeError(cause)) {
      lines.push(chalk.red(`  Cause: ${cause.message}`));
    }

    if (options.debug && error.stack) {
      lines.push(chalk.gray(error.stack));
    }

    return lines.join('\n');
  }

  private severityLabel(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.Warning:
        return chalk.yellow('Warning: ');
      case ErrorSeverity.Info:
        return chalk.blue('Info: ');
      default:
        return chalk.red('Error: ');
    }
  }
}
