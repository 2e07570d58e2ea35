import { LivensError, ErrorSeverity } from '@core/errors/LivensError';

/**
 * Reported when a pass's bindings cannot be captured. Never thrown: the
 * pass still completes and only its incremental state is lost.
 */
export class CaptureDegradation extends LivensError {
  constructor(reason: string, namespace?: string) {
    super(`Local-state capture unavailable: ${reason}`, {
      code: 'CAPTURE_DEGRADED',
      severity: ErrorSeverity.Warning,
      details: namespace ? { namespace } : undefined
    });

    this.name = 'CaptureDegradation';

    Object.setPrototypeOf(this, CaptureDegradation.prototype);
  }
}
