import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { resolveAliases, planRequests } from './aliases';
import { Namespace } from '@interpreter/env/Namespace';
import { ActionRegistry } from '@core/registry/ActionRegistry';
import { ConfigurationError } from '@core/errors';

const silent = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };

describe('resolveAliases', () => {
  let namespace: Namespace;
  let actions: ActionRegistry;
  let requireHandler: Mock<[target: string], string>;

  beforeEach(() => {
    namespace = new Namespace('app.main');
    requireHandler = vi.fn((target: string) => `module:${target}`);
    actions = new ActionRegistry().register('require', requireHandler);
  });

  it('should invoke the action for every alias', () => {
    const resolved = resolveAliases(namespace, { require: { u: 'app.util', s: 'app.str' } }, actions, silent);

    expect(resolved.get('u')).toEqual({
      value: 'module:app.util',
      origin: { action: 'require', target: 'app.util' },
      restored: false
    });
    expect(resolved.get('s')?.value).toBe('module:app.str');
    expect(requireHandler).toHaveBeenCalledWith('app.util', { alias: 'u', requester: 'app.main' });
  });

  it('should accept caller-chosen action names', () => {
    actions.register('env', (target: string) => target.toUpperCase());

    const resolved = resolveAliases(namespace, { env: { home: 'home' } }, actions, silent);
    expect(resolved.get('home')?.value).toBe('HOME');
  });

  it('should restore persisted aliases without invoking the action', () => {
    namespace.commitLocals(new Map([
      ['u', { value: 'cached-util', origin: { action: 'require', target: 'app.util' } }],
      ['helper', { value: 'not-an-alias' }]
    ]));

    const resolved = resolveAliases(namespace, {}, actions, silent);

    expect(requireHandler).not.toHaveBeenCalled();
    expect(resolved.get('u')).toEqual({
      value: 'cached-util',
      origin: { action: 'require', target: 'app.util' },
      restored: true
    });
    expect(resolved.has('helper')).toBe(false);
  });

  it('should prefer the explicit request over a persisted alias', () => {
    namespace.commitLocals(new Map([
      ['u', { value: 'stale', origin: { action: 'require', target: 'app.util' } }]
    ]));

    const resolved = resolveAliases(namespace, { require: { u: 'app.util2' } }, actions, silent);

    expect(requireHandler).toHaveBeenCalledTimes(1);
    expect(resolved.get('u')).toEqual({
      value: 'module:app.util2',
      origin: { action: 'require', target: 'app.util2' },
      restored: false
    });
  });

  it('should let the last duplicate alias win and warn', () => {
    actions.register('include', (target: string) => `included:${target}`);

    const resolved = resolveAliases(
      namespace,
      { require: { u: 'app.a' }, include: { u: 'app.b' } },
      actions,
      silent
    );

    expect(resolved.get('u')?.value).toBe('included:app.b');
    expect(silent.warn).toHaveBeenCalled();
  });

  describe('configuration errors', () => {
    it('should fail on an unknown action before invoking any handler', () => {
      expect(() =>
        resolveAliases(namespace, { require: { u: 'app.util' }, fetch: { x: 'y' } }, actions, silent)
      ).toThrow(ConfigurationError);

      expect(requireHandler).not.toHaveBeenCalled();
    });

    it('should name the missing action and the available ones', () => {
      try {
        planRequests('app.main', { fetch: { x: 'y' } }, actions);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.details.action).toBe('fetch');
          expect(error.details.availableActions).toEqual(['require']);
        }
      }
    });

    it('should reject invalid aliases and empty targets', () => {
      expect(() => planRequests('app.main', { require: { 'a b': 'x' } }, actions)).toThrow("Invalid alias 'a b'");
      expect(() => planRequests('app.main', { require: { a: '' } }, actions)).toThrow("Alias 'a' in 'require' request has no target");
    });

    it('should resolve synonyms configured on the registry', () => {
      actions.alias('import', 'require');

      const resolved = resolveAliases(namespace, { import: { u: 'app.util' } }, actions, silent);
      expect(resolved.get('u')?.origin).toEqual({ action: 'import', target: 'app.util' });
      expect(requireHandler).toHaveBeenCalledTimes(1);
    });
  });
});
