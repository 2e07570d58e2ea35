import { LivensError, ErrorSeverity } from '@core/errors/LivensError';

/**
 * Error thrown when an evaluation pass is used out of order: entering a
 * second namespace, defining before entry, or binding on a closed context.
 */
export class PassStateError extends LivensError {
  constructor(message: string, namespace?: string) {
    super(message, {
      code: 'PASS_STATE',
      severity: ErrorSeverity.Fatal,
      details: namespace ? { namespace } : undefined
    });

    this.name = 'PassStateError';

    Object.setPrototypeOf(this, PassStateError.prototype);
  }
}
