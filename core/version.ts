import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

// core/version.ts in sources, dist/*.js when bundled: package.json is one level up either way
const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../package.json');

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch (error) {
    console.warn('Failed to read version from package.json:', error);
  }
  return '0.0.0';
}

export const version = readVersion();
