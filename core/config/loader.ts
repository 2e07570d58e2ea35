import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { LivensConfig, ResolvedConfig, LogLevel } from './types';
import { LOG_LEVELS } from './types';
import { ConfigurationError } from '@core/errors/ConfigurationError';
import { configLogger } from '@core/utils/logger';
import type { ILogger } from '@core/utils/logger';

export const PROJECT_CONFIG_FILE = 'livens.config.json';

/**
 * Load livens configuration from both global and project locations
 */
export class ConfigLoader {
  readonly globalConfigPath: string;
  readonly projectConfigPath: string;
  private readonly projectPath: string;
  private cachedConfig?: LivensConfig;

  constructor(projectPath?: string, private readonly logger: ILogger = configLogger) {
    this.projectPath = projectPath ?? process.cwd();

    // Global config location: ~/.config/livens.json
    this.globalConfigPath = path.join(os.homedir(), '.config', 'livens.json');

    // Project config location: <project>/livens.config.json
    this.projectConfigPath = path.join(this.projectPath, PROJECT_CONFIG_FILE);
  }

  /**
   * Load and merge configurations (project overrides global)
   */
  load(): LivensConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * Resolve configuration to runtime values. Relative roots are taken from
   * the project directory.
   */
  resolve(config: LivensConfig = this.load()): ResolvedConfig {
    return {
      logLevel: config.logging?.level ?? 'error',
      roots: (config.modules?.roots ?? ['.']).map(root => path.resolve(this.projectPath, root)),
      extensions: config.modules?.extensions ?? ['.js'],
      actionAliases: { ...(config.actions?.aliases ?? {}) }
    };
  }

  /**
   * Missing or unreadable files count as empty; files that parse but have
   * the wrong shape are configuration errors.
   */
  private loadConfigFile(filePath: string): LivensConfig {
    let raw: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      this.logger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }

    return normalizeConfig(raw, filePath);
  }

  private mergeConfigs(global: LivensConfig, project: LivensConfig): LivensConfig {
    const merged: LivensConfig = {};

    const level = project.logging?.level ?? global.logging?.level;
    if (level) {
      merged.logging = { level };
    }

    // Lists are replaced, not concatenated: roots are project-relative
    const roots = project.modules?.roots ?? global.modules?.roots;
    const extensions = project.modules?.extensions ?? global.modules?.extensions;
    if (roots || extensions) {
      merged.modules = {};
      if (roots) merged.modules.roots = [...roots];
      if (extensions) merged.modules.extensions = [...extensions];
    }

    if (global.actions?.aliases || project.actions?.aliases) {
      merged.actions = {
        aliases: {
          ...(global.actions?.aliases ?? {}),
          ...(project.actions?.aliases ?? {})
        }
      };
    }

    return merged;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function stringList(value: unknown, field: string, configPath: string): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ConfigurationError(`${field} must be an array of strings`, { configPath });
  }
  return value.map(String);
}

/**
 * Checks parsed JSON against the {@link LivensConfig} shape.
 */
export function normalizeConfig(raw: unknown, configPath: string): LivensConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Configuration must be a JSON object', { configPath });
  }

  const config: LivensConfig = {};

  if (raw.logging !== undefined) {
    if (!isRecord(raw.logging)) {
      throw new ConfigurationError('logging must be an object', { configPath });
    }
    const level = raw.logging.level;
    if (level !== undefined && !isLogLevel(level)) {
      throw new ConfigurationError(`logging.level must be one of ${LOG_LEVELS.join(', ')}`, { configPath });
    }
    config.logging = level === undefined ? {} : { level };
  }

  if (raw.modules !== undefined) {
    if (!isRecord(raw.modules)) {
      throw new ConfigurationError('modules must be an object', { configPath });
    }
    config.modules = {};
    if (raw.modules.roots !== undefined) {
      config.modules.roots = stringList(raw.modules.roots, 'modules.roots', configPath);
    }
    if (raw.modules.extensions !== undefined) {
      config.modules.extensions = stringList(raw.modules.extensions, 'modules.extensions', configPath);
    }
  }

  if (raw.actions !== undefined) {
    if (!isRecord(raw.actions)) {
      throw new ConfigurationError('actions must be an object', { configPath });
    }
    const aliases = raw.actions.aliases;
    if (aliases !== undefined) {
      if (!isRecord(aliases) || !Object.values(aliases).every(target => typeof target === 'string')) {
        throw new ConfigurationError('actions.aliases must map action names to action names', { configPath });
      }
      config.actions = { aliases: Object.fromEntries(Object.entries(aliases).map(([name, target]) => [name, String(target)])) };
    } else {
      config.actions = {};
    }
  }

  return config;
}
