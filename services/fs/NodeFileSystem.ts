import * as fs from 'fs';
import type { ISyncFileSystem } from './ISyncFileSystem';

/**
 * Node.js file system implementation for module loading
 */
export class NodeFileSystem implements ISyncFileSystem {
  readFileSync(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  isFileSync(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      return false;
    }
  }
}
