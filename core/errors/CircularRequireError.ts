import { LivensError, ErrorSeverity } from '@core/errors/LivensError';

/**
 * Error thrown when loading a module requires a module that is still being
 * loaded further up the stack.
 */
export class CircularRequireError extends LivensError {
  public readonly chain: string[];

  constructor(chain: string[]) {
    super(`Circular require detected: ${chain.join(' → ')}`, {
      code: 'CIRCULAR_REQUIRE',
      severity: ErrorSeverity.Fatal,
      details: { chain }
    });

    this.name = 'CircularRequireError';
    this.chain = chain;

    Object.setPrototypeOf(this, CircularRequireError.prototype);
  }
}
