/**
 * Synchronous file access for module loading. Actions run synchronously
 * inside a pass, so sources are read without awaiting.
 */
export interface ISyncFileSystem {
  readFileSync(filePath: string): string;
  isFileSync(filePath: string): boolean;
}
