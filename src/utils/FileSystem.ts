import * as fs from 'fs-extra';
import * as path from 'path';

/**
 * Synchronous probes used by classification. A JVM is resolved from one pass over the disk, so nothing
 * here caches.
 */
export class FileSystem {
  static exists(filePath: string): boolean {
    return fs.pathExistsSync(filePath);
  }

  static isDirectory(dirPath: string): boolean {
    try {
      return fs.statSync(dirPath).isDirectory();
    } catch {
      return false;
    }
  }

  static isFile(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      return false;
    }
  }

  static readTextIfExists(filePath: string): string | null {
    if (!FileSystem.isFile(filePath)) {
      return null;
    }

    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new Error(
        `Failed to read file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  /**
   * Follows symlinks (e.g. `/usr/bin/java` → `/usr/lib/jvm/.../bin/java`). Falls back to the normalized
   * path when the target cannot be resolved.
   */
  static resolveRealPath(filePath: string): string {
    try {
      return fs.realpathSync(filePath);
    } catch {
      return FileSystem.normalizePath(filePath);
    }
  }

  static normalizePath(inputPath: string): string {
    return path.resolve(path.normalize(inputPath));
  }
}
