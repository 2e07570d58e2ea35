import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock, MockInstance } from 'vitest';
import { Readable, Writable } from 'stream';
import { main } from './index';
import { ErrorHandler } from './error/ErrorHandler';
import { MemoryFileSystem } from '@tests/utils/MemoryFileSystem';
import type { ResolvedConfig } from '@core/config/types';
import { version } from '@core/version';

const silent = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };

function configWith(overrides: Partial<ResolvedConfig> = {}): ResolvedConfig {
  return {
    logLevel: 'error',
    roots: ['/project'],
    extensions: ['.js'],
    actionAliases: {},
    ...overrides
  };
}

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    }
  });
  return { stream, text: () => chunks.join('') };
}

describe('CLI', () => {
  let fileSystem: MemoryFileSystem;
  let logSpy: MockInstance;
  let errorSpy: MockInstance;
  let loadConfig: Mock<[string], ResolvedConfig>;

  beforeEach(() => {
    fileSystem = new MemoryFileSystem({
      '/project/src/app/util.js': "module('app.util'); defn('inc', ['n'], n => n + 1);",
      '/project/src/app/main.js': "module('app.main', { require: { util: 'app.util' } }); def('two', util.inc(1));",
      '/project/lib/app/extra.js': "module('app.extra'); def('flag', true);"
    });
    loadConfig = vi.fn<[string], ResolvedConfig>(() => configWith({ roots: ['/project/src'] }));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const run = (args: string[], extra: Parameters<typeof main>[1] = {}) =>
    main(args, { fileSystem, cwd: '/project', loadConfig, errorHandler: new ErrorHandler(silent), ...extra });

  it('prints the version', async () => {
    expect(await run(['--version'])).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(`livens v${version}`);
  });

  it('prints usage and fails without a command', async () => {
    expect(await run([])).toBe(1);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('Usage: livens [options] <command> [inputs]'));
  });

  it('evaluates a file and the modules it requires', async () => {
    expect(await run(['eval', 'src/app/main.js'])).toBe(0);

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('app.main'));
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('(two)'));
  });

  it('loads module names from the command-line roots', async () => {
    expect(await run(['--root', 'lib', 'eval', 'app.extra'])).toBe(0);

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('(flag)'));
  });

  it('reads configuration from the --config directory', async () => {
    await run(['--config', 'conf', 'eval', 'app.util']);

    expect(loadConfig).toHaveBeenCalledWith('/project/conf');
  });

  it('reports missing modules and exits with 1', async () => {
    expect(await run(['eval', 'app.none'])).toBe(1);

    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("Module 'app.none' not found"));
  });

  it('reports bad arguments and exits with 1', async () => {
    expect(await run(['run', 'main.js'])).toBe(1);

    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Unknown command: run'));
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[COMMAND_USAGE]'));
  });

  it('reports eval without inputs as a usage error', async () => {
    expect(await run(['eval'])).toBe(1);

    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('eval needs at least one file or module name'));
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[COMMAND_USAGE]'));
  });

  it('runs a REPL session over the given streams', async () => {
    const output = collector();
    const input = Readable.from(["def('x', 41)\n", ':exports\n', ':quit\n', "def('y', 1)\n"]);

    expect(await run(['repl', '--module', 'scratch'], { input, output: output.stream })).toBe(0);

    expect(output.text()).toBe('scratch=> 41\nscratch=> x\nscratch=> ');
  });
});
