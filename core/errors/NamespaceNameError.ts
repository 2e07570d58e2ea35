import { LivensError, ErrorSeverity } from '@core/errors/LivensError';

/**
 * Error thrown when a namespace name is not a dot-separated path of
 * identifier segments.
 */
export class NamespaceNameError extends LivensError {
  public readonly namespaceName: string;

  constructor(namespaceName: string) {
    super(`Invalid namespace name '${namespaceName}': expected dot-separated identifiers such as 'app.core'`, {
      code: 'INVALID_NAMESPACE_NAME',
      severity: ErrorSeverity.Fatal,
      details: { namespaceName }
    });

    this.name = 'NamespaceNameError';
    this.namespaceName = namespaceName;

    Object.setPrototypeOf(this, NamespaceNameError.prototype);
  }
}
