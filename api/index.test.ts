import { describe, it, expect } from 'vitest';
import {
  createFileRuntime,
  evaluateScript,
  createRuntime,
  InMemorySourceProvider,
  define,
  ModuleNotFoundError,
  LivensError
} from '@api/index';
import { MemoryFileSystem } from '@tests/utils/MemoryFileSystem';

describe('API', () => {
  const fileSystem = () =>
    new MemoryFileSystem({
      '/src/lib/math.js': "module('lib.math'); defn('square', ['x'], x => x * x);"
    });

  it('evaluates scripts against file-backed modules', () => {
    const runtime = createFileRuntime({ roots: ['/src'], fileSystem: fileSystem() });

    const result = evaluateScript("module('app', { require: { math: 'lib.math' } }); def('nine', math.square(3));", { runtime });

    expect(result.namespace?.name).toBe('app');
    expect(result.value).toBe(9);
    expect(runtime.lookup('app', 'nine')).toBe(9);
    expect(runtime.registry.get('lib.math')?.loaded).toBe(true);
  });

  it('evaluates snippets inside a given module', () => {
    const runtime = createFileRuntime({ roots: ['/src'], fileSystem: fileSystem() });

    evaluateScript("def('base', 10)", { runtime, module: 'scratch' });
    const result = evaluateScript('base * 2', { runtime, module: 'scratch' });

    expect(result.value).toBe(20);
  });

  it('honours action synonyms', () => {
    const runtime = createFileRuntime({ roots: ['/src'], fileSystem: fileSystem(), actionAliases: { import: 'require' } });

    evaluateScript("module('app', { import: { m: 'lib.math' } }); def('four', m.square(2));", { runtime });

    expect(runtime.lookup('app', 'four')).toBe(4);
  });

  it('exposes the runtime building blocks', () => {
    const sources = new InMemorySourceProvider().register('app.config', pass => {
      define(pass.enter('app.config'), 'port', 8080);
    });
    const runtime = createRuntime({ sources });

    expect(runtime.load('app.config').getExport('port')).toBe(8080);
    expect(() => runtime.load('app.missing')).toThrow(ModuleNotFoundError);
    expect(ModuleNotFoundError.noSource('x')).toBeInstanceOf(LivensError);
  });
});
