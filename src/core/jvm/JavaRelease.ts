import * as path from 'path';
import { FileSystem } from '../../utils/FileSystem';

/**
 * Reads the `release` file JDK and JRE builds ship at their root, e.g.
 *
 * ```
 * JAVA_VERSION="1.8.0_292"
 * IMPLEMENTOR="AdoptOpenJDK"
 * ```
 */
export function readReleaseFile(javaHome: string): Record<string, string> | null {
  const content = FileSystem.readTextIfExists(path.join(javaHome, 'release'));
  if (content === null) {
    return null;
  }

  const entries: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const match = /^\s*([A-Z_][A-Z0-9_]*)\s*=\s*(.*)$/.exec(line);
    if (match) {
      entries[match[1]] = match[2].trim().replace(/^"(.*)"$/, '$1');
    }
  }
  return entries;
}

/**
 * `JAVA_VERSION` from the release file, then `fallback`, then a guess from the layout: only modular
 * (9+) runtime images carry `lib/modules`.
 */
export function detectJavaVersion(javaHome: string, fallback?: string): string {
  const release = readReleaseFile(javaHome);
  if (release?.JAVA_VERSION) {
    return release.JAVA_VERSION;
  }
  if (fallback) {
    return fallback;
  }
  return FileSystem.isFile(path.join(javaHome, 'lib', 'modules')) ? '9' : '1.8';
}

export function detectVendor(javaHome: string, fallback?: string): string {
  const release = readReleaseFile(javaHome);
  return release?.IMPLEMENTOR || fallback || 'unknown';
}
