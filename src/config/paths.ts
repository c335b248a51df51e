/**
 * Resolves files under the base storage directory, creating directories on demand
 */

import { mkdirSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export class FileConfigResolver {
  readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
    mkdirSync(this.baseDir, { recursive: true });
  }

  /**
   * Absolute path for a file relative to the base directory.
   * Parent directories are created if missing.
   */
  getFilePath(relativePath: string): string {
    const fullPath = join(this.baseDir, relativePath);
    mkdirSync(dirname(fullPath), { recursive: true });
    return fullPath;
  }
}
