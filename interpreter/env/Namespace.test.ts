import { describe, it, expect } from 'vitest';
import { Namespace } from './Namespace';

describe('Namespace', () => {
  it('should start from the base exports', () => {
    const namespace = new Namespace('app.ext', { f: 1 });
    expect(namespace.getExport('f')).toBe(1);
    expect(namespace.hasExport('g')).toBe(false);
  });

  describe('commitLocals', () => {
    it('should merge captured bindings over earlier ones', () => {
      const namespace = new Namespace('app.main');
      namespace.commitLocals(new Map([['a', { value: 1 }], ['b', { value: 2 }]]));
      namespace.commitLocals(new Map([['b', { value: 3 }]]));

      expect(Object.fromEntries(namespace.persistedLocals)).toEqual({
        a: { value: 1 },
        b: { value: 3 }
      });
      expect(namespace.passCount).toBe(2);
      expect(namespace.loaded).toBe(true);
    });

    it('should replace the slot rather than mutate it', () => {
      const namespace = new Namespace('app.main');
      const before = namespace.persistedLocals;

      namespace.commitLocals(new Map([['a', { value: 1 }]]));

      expect(namespace.persistedLocals).not.toBe(before);
      expect(before.size).toBe(0);
    });
  });

  describe('exportsView', () => {
    it('should be the same object on every access', () => {
      const namespace = new Namespace('app.util');
      expect(namespace.exportsView).toBe(namespace.exportsView);
    });

    it('should track exports live', () => {
      const namespace = new Namespace('app.util');
      const view = namespace.exportsView;

      namespace.exports.set('inc', 1);
      expect(view.inc).toBe(1);
      expect('inc' in view).toBe(true);
      expect(Object.keys(view)).toEqual(['inc']);
      expect({ ...view }).toEqual({ inc: 1 });

      namespace.exports.set('inc', 2);
      expect(view.inc).toBe(2);
    });

    it('should be read-only', () => {
      const namespace = new Namespace('app.util', { inc: 1 });

      expect(Reflect.set(namespace.exportsView, 'extra', 1)).toBe(false);
      expect(Reflect.deleteProperty(namespace.exportsView, 'inc')).toBe(false);
      expect(namespace.getExport('inc')).toBe(1);
      expect(namespace.hasExport('extra')).toBe(false);
    });
  });
});
