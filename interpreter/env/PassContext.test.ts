import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PassContext, captureLocals } from './PassContext';
import { Namespace } from './Namespace';
import { PassStateError } from '@core/errors';
import type { ILogger } from '@core/utils/logger';

function createSpyLogger(): ILogger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn()
  };
}

describe('PassContext', () => {
  let namespace: Namespace;
  let logger: ILogger;

  beforeEach(() => {
    namespace = new Namespace('app.main');
    logger = createSpyLogger();
  });

  it('should record bindings with last write winning', () => {
    const ctx = new PassContext(namespace, logger);
    ctx.bind('x', 1);
    ctx.bind('x', 2);

    expect(ctx.get('x')).toBe(2);
    expect(captureLocals(ctx, logger)).toEqual(new Map([['x', { value: 2 }]]));
  });

  it('should keep the alias origin of a binding', () => {
    const ctx = new PassContext(namespace, logger);
    ctx.bind('u', 'util-exports', { action: 'require', target: 'app.util' });

    expect(captureLocals(ctx, logger).get('u')).toEqual({
      value: 'util-exports',
      origin: { action: 'require', target: 'app.util' }
    });
  });

  it('should look up pass bindings, then persisted locals, then exports', () => {
    namespace.exports.set('a', 'export-a');
    namespace.exports.set('b', 'export-b');
    namespace.exports.set('c', 'export-c');
    namespace.commitLocals(new Map([
      ['b', { value: 'local-b' }],
      ['c', { value: 'local-c' }]
    ]));

    const ctx = new PassContext(namespace, logger);
    ctx.bind('c', 'pass-c');

    expect(ctx.get('a')).toBe('export-a');
    expect(ctx.get('b')).toBe('local-b');
    expect(ctx.get('c')).toBe('pass-c');
    expect(ctx.get('missing')).toBeUndefined();
    expect(ctx.has('a')).toBe(true);
    expect(ctx.has('missing')).toBe(false);
    expect(ctx.visibleNames()).toEqual(['c', 'b', 'a']);
  });

  it('should capture only the bindings of this pass', () => {
    namespace.commitLocals(new Map([['old', { value: 1 }]]));
    const ctx = new PassContext(namespace, logger);
    ctx.bind('fresh', 2);

    expect(Array.from(captureLocals(ctx, logger).keys())).toEqual(['fresh']);
  });

  it('should return a copy from capture', () => {
    const ctx = new PassContext(namespace, logger);
    ctx.bind('x', 1);

    const captured = captureLocals(ctx, logger);
    ctx.bind('y', 2);

    expect(captured.has('y')).toBe(false);
  });

  it('should reject bindings after close', () => {
    const ctx = new PassContext(namespace, logger);
    ctx.close();

    expect(ctx.isOpen).toBe(false);
    expect(() => ctx.bind('x', 1)).toThrow(PassStateError);
  });

  describe('capture degradation', () => {
    it('should return an empty mapping for a closed context and log a warning', () => {
      const ctx = new PassContext(namespace, logger);
      ctx.bind('x', 1);
      ctx.close();

      const captured = captureLocals(ctx, logger);

      expect(captured.size).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        'Local-state capture unavailable: pass context already closed',
        expect.objectContaining({ code: 'CAPTURE_DEGRADED' })
      );
    });

    it('should return an empty mapping when there is no context', () => {
      expect(captureLocals(undefined, logger).size).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });
});
