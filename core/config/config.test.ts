import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConfigLoader, normalizeConfig } from './loader';
import { ConfigurationError } from '@core/errors';

// Mock fs module
vi.mock('fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn()
}));

import * as fs from 'fs';

const silent = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };

function useFiles(files: Record<string, string>): void {
  vi.mocked(fs.existsSync).mockImplementation(filePath => String(filePath) in files);
  vi.mocked(fs.readFileSync).mockImplementation(filePath => files[String(filePath)] ?? '');
}

describe('Configuration System', () => {
  let loader: ConfigLoader;

  beforeEach(() => {
    vi.clearAllMocks();
    loader = new ConfigLoader('/project', silent);
  });

  it('should use defaults when no config files exist', () => {
    useFiles({});

    expect(loader.load()).toEqual({});
    expect(loader.resolve()).toEqual({
      logLevel: 'error',
      roots: ['/project'],
      extensions: ['.js'],
      actionAliases: {}
    });
  });

  it('should let the project override the global config', () => {
    useFiles({
      [loader.globalConfigPath]: JSON.stringify({
        logging: { level: 'info' },
        modules: { roots: ['global-src'], extensions: ['.mjs'] },
        actions: { aliases: { import: 'require', use: 'include' } }
      }),
      [loader.projectConfigPath]: JSON.stringify({
        modules: { roots: ['src', 'lib'] },
        actions: { aliases: { use: 'autoload' } }
      })
    });

    expect(loader.resolve()).toEqual({
      logLevel: 'info',
      roots: ['/project/src', '/project/lib'],
      extensions: ['.mjs'],
      actionAliases: { import: 'require', use: 'autoload' }
    });
  });

  it('should read the files only once', () => {
    useFiles({ [loader.projectConfigPath]: '{}' });

    loader.load();
    loader.load();

    expect(fs.readFileSync).toHaveBeenCalledTimes(1);
  });

  it('should ignore unparseable files with a warning', () => {
    useFiles({ [loader.projectConfigPath]: '{ not json' });

    expect(loader.load()).toEqual({});
    expect(silent.warn).toHaveBeenCalledWith(
      `Failed to load config from ${loader.projectConfigPath}`,
      expect.objectContaining({ error: expect.any(String) })
    );
  });

  it('should reject files with the wrong shape', () => {
    useFiles({ [loader.projectConfigPath]: JSON.stringify({ modules: { roots: 'src' } }) });

    expect(() => loader.load()).toThrow(ConfigurationError);
  });

  describe('normalizeConfig', () => {
    it('should accept a complete config', () => {
      const raw = {
        logging: { level: 'debug' },
        modules: { roots: ['src'], extensions: ['.js'] },
        actions: { aliases: { import: 'require' } }
      };

      expect(normalizeConfig(raw, 'livens.config.json')).toEqual(raw);
    });

    it('should reject unknown log levels', () => {
      expect(() => normalizeConfig({ logging: { level: 'loud' } }, 'livens.config.json')).toThrow(
        'logging.level must be one of error, warn, info, debug'
      );
    });

    it('should reject non-object configs and non-string aliases', () => {
      expect(() => normalizeConfig([], 'x.json')).toThrow('Configuration must be a JSON object');
      expect(() => normalizeConfig({ actions: { aliases: { import: 1 } } }, 'x.json')).toThrow(
        'actions.aliases must map action names to action names'
      );
    });
  });
});
