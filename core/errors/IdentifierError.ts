import { LivensError, ErrorSeverity } from '@core/errors/LivensError';

export type IdentifierKind = 'export' | 'local' | 'alias';

/**
 * Error thrown when a definition or alias uses a name that is not a valid
 * identifier.
 */
export class IdentifierError extends LivensError {
  public readonly identifier: string;
  public readonly kind: IdentifierKind;

  constructor(identifier: string, kind: IdentifierKind, namespace?: string) {
    super(`Invalid ${kind} name '${identifier}'`, {
      code: 'INVALID_IDENTIFIER',
      severity: ErrorSeverity.Fatal,
      details: { identifier, kind, namespace }
    });

    this.name = 'IdentifierError';
    this.identifier = identifier;
    this.kind = kind;

    Object.setPrototypeOf(this, IdentifierError.prototype);
  }
}
