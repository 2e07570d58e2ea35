import { LivensError, ErrorSeverity } from '@core/errors/LivensError';
import type { BaseErrorDetails } from '@core/errors/LivensError';

export interface ConfigurationErrorDetails extends BaseErrorDetails {
  action?: string;
  alias?: string;
  target?: string;
  availableActions?: string[];
  configPath?: string;
}

/**
 * Error thrown when a request table or a configuration file cannot be used
 * as written. Always fatal: the pass or command that met it is aborted.
 */
export class ConfigurationError extends LivensError {
  public readonly details: ConfigurationErrorDetails;

  constructor(message: string, details: ConfigurationErrorDetails = {}, cause?: unknown) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      severity: ErrorSeverity.Fatal,
      details,
      cause
    });

    this.name = 'ConfigurationError';
    this.details = details;

    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  static unknownAction(action: string, namespace: string, availableActions: string[]): ConfigurationError {
    const available = availableActions.length > 0 ? availableActions.join(', ') : 'none';
    return new ConfigurationError(
      `No handler registered for action '${action}' (available: ${available})`,
      { action, namespace, availableActions }
    );
  }
}
