import { LivensError, ErrorSeverity } from '@core/errors/LivensError';

export interface ModuleNotFoundDetails {
  moduleName: string;
  requester?: string;
  origin?: string;
  searched?: string[];
}

/**
 * Error thrown when a module is required by name and neither a loaded
 * namespace nor a source for it exists.
 */
export class ModuleNotFoundError extends LivensError {
  public readonly moduleName: string;

  constructor(message: string, details: ModuleNotFoundDetails) {
    super(message, {
      code: 'MODULE_NOT_FOUND',
      severity: ErrorSeverity.Recoverable,
      details: { ...details, namespace: details.requester }
    });

    this.name = 'ModuleNotFoundError';
    this.moduleName = details.moduleName;

    Object.setPrototypeOf(this, ModuleNotFoundError.prototype);
  }

  static noSource(moduleName: string, searched: string[] = []): ModuleNotFoundError {
    const where = searched.length > 0 ? ` (searched: ${searched.join(', ')})` : '';
    return new ModuleNotFoundError(`Module '${moduleName}' not found${where}`, { moduleName, searched });
  }

  static notDeclared(moduleName: string, origin: string): ModuleNotFoundError {
    return new ModuleNotFoundError(
      `Source ${origin} was evaluated but did not enter namespace '${moduleName}'`,
      { moduleName, origin }
    );
  }
}
