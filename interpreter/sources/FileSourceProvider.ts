import * as path from 'path';
import type { ModuleSource, ModuleSourceProvider } from './ModuleSourceProvider';
import type { ISyncFileSystem } from '@services/fs/ISyncFileSystem';
import type { ScriptFrontEnd } from '@interpreter/frontend/ScriptFrontEnd';
import { isValidNamespaceName } from '@core/utils/identifiers';
import { loaderLogger } from '@core/utils/logger';
import type { ILogger } from '@core/utils/logger';

export interface FileSourceOptions {
  /** Directories searched in order */
  roots: readonly string[];
  /** File extensions tried in order, e.g. `['.js']` */
  extensions: readonly string[];
}

/**
 * Maps dotted module names onto files: `app.util` is looked up as
 * `<root>/app/util<ext>` for every root and extension.
 */
export class FileSourceProvider implements ModuleSourceProvider {
  constructor(
    private readonly fileSystem: ISyncFileSystem,
    private readonly frontEnd: ScriptFrontEnd,
    private readonly options: FileSourceOptions,
    private readonly logger: ILogger = loaderLogger
  ) {}

  candidates(name: string): string[] {
    const relative = path.join(...name.split('.'));
    return this.options.roots.flatMap(root =>
      this.options.extensions.map(extension => path.resolve(root, relative + extension))
    );
  }

  find(name: string): ModuleSource | undefined {
    if (!isValidNamespaceName(name)) {
      return undefined;
    }

    const filePath = this.candidates(name).find(candidate => this.fileSystem.isFileSync(candidate));
    if (!filePath) {
      return undefined;
    }

    this.logger.debug('Found module source', { namespace: name, filePath });
    return this.fromFile(filePath, name);
  }

  searched(name: string): string[] {
    return this.candidates(name);
  }

  /** Compiles the file at `filePath`; `name` defaults to the name its location implies */
  fromFile(filePath: string, name = this.moduleNameFor(filePath) ?? filePath): ModuleSource {
    const origin = path.resolve(filePath);
    const unit = this.frontEnd.compile(this.fileSystem.readFileSync(origin), origin);
    return { name, origin, unit };
  }

  /**
   * The module name a file under one of the roots stands for, or undefined
   * when the file is outside every root or has another extension.
   */
  moduleNameFor(filePath: string): string | undefined {
    const absolute = path.resolve(filePath);
    const extension = this.options.extensions.find(candidate => absolute.endsWith(candidate));
    if (!extension) {
      return undefined;
    }

    for (const root of this.options.roots) {
      const relative = path.relative(path.resolve(root), absolute);
      if (relative.startsWith('..') || path.isAbsolute(relative)) {
        continue;
      }
      const name = relative.slice(0, -extension.length).split(path.sep).join('.');
      if (isValidNamespaceName(name)) {
        return name;
      }
    }

    return undefined;
  }
}
