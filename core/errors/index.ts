/**
 * Central export point for livens error types.
 */
export { LivensError, ErrorSeverity } from './LivensError';
export type { BaseErrorDetails, LivensErrorOptions } from './LivensError';
export { ConfigurationError } from './ConfigurationError';
export type { ConfigurationErrorDetails } from './ConfigurationError';
export { NamespaceNameError } from './NamespaceNameError';
export { IdentifierError } from './IdentifierError';
export type { IdentifierKind } from './IdentifierError';
export { PassStateError } from './PassStateError';
export { ModuleNotFoundError } from './ModuleNotFoundError';
export type { ModuleNotFoundDetails } from './ModuleNotFoundError';
export { CircularRequireError } from './CircularRequireError';
export { CaptureDegradation } from './CaptureDegradation';
export { CommandUsageError } from './CommandUsageError';
