import { describe, it, expect, afterEach, vi } from 'vitest';
import { ErrorHandler } from './ErrorHandler';
import { CaptureDegradation, ModuleNotFoundError, LivensError, ErrorSeverity } from '@core/errors';

const silent = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };

describe('ErrorHandler', () => {
  const handler = new ErrorHandler(silent);

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('shows the message and code of livens errors', () => {
    const formatted = handler.format(ModuleNotFoundError.noSource('app.none', []));

    expect(formatted).toContain("Module 'app.none' not found");
    expect(formatted).toContain('[MODULE_NOT_FOUND]');
  });

  it('labels warnings', () => {
    expect(handler.format(new CaptureDegradation('pass context is closed'))).toContain('Warning: ');
  });

  it('shows the cause', () => {
    const error = new LivensError('Load failed', {
      code: 'TEST',
      severity: ErrorSeverity.Fatal,
      cause: new Error('disk on fire')
    });

    expect(handler.format(error)).toContain('Cause: disk on fire');
  });

  it('appends the stack only in debug mode', () => {
    const error = new Error('plain');

    expect(handler.format(error)).not.toContain('at ');
    expect(handler.format(error, { debug: true })).toContain(error.stack ?? 'missing stack');
  });

  it('handles thrown non-errors', () => {
    expect(handler.format('just a string')).toContain('Unknown Error: just a string');
  });

  it('prints to stderr', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    handler.handleError(new Error('printed'));

    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('printed'));
  });
});
