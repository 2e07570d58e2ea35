import { LivensError, ErrorSeverity } from '@core/errors/LivensError';

/**
 * Error thrown when a CLI or REPL command is invoked with missing or
 * unknown arguments.
 */
export class CommandUsageError extends LivensError {
  constructor(message: string, command?: string) {
    super(message, {
      code: 'COMMAND_USAGE',
      severity: ErrorSeverity.Fatal,
      details: command ? { command } : undefined
    });

    this.name = 'CommandUsageError';

    Object.setPrototypeOf(this, CommandUsageError.prototype);
  }
}
