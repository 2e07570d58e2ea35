/**
 * Configuration types for livens
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LivensConfig {
  logging?: LoggingConfig;
  modules?: ModulesConfig;
  actions?: ActionsConfig;
}

export interface LoggingConfig {
  level?: LogLevel;
}

export interface ModulesConfig {
  /** Directories searched for module sources, relative to the project */
  roots?: string[];
  /** Source file extensions, tried in order */
  extensions?: string[];
}

export interface ActionsConfig {
  /** Synonyms for action names, e.g. `{ "import": "require" }` */
  aliases?: Record<string, string>;
}

// Runtime configuration after merging and applying defaults
export interface ResolvedConfig {
  logLevel: LogLevel;
  roots: string[];
  extensions: string[];
  actionAliases: Record<string, string>;
}
