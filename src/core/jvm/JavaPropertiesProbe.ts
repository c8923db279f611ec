import { JavaProperties } from '../../types/Jvm';
import { logger } from '../../utils/Logger';
import { ProcessUtils } from '../../utils/ProcessUtils';
import { JvmError, JvmErrorCode } from '../errors';

export type ReportedSettings = Record<string, string | string[]>;

const PROBE_TIMEOUT_MS = 15000;

/**
 * Asks a `java` executable for its system properties via `-XshowSettings:properties -version`.
 * HotSpot prints them on stderr as `    key = value`, with list values continued on lines indented
 * by eight spaces.
 */
export class JavaPropertiesProbe {
  static async probe(javaExecutable: string): Promise<JavaProperties> {
    let stderr: string;
    try {
      const result = await ProcessUtils.execute(
        javaExecutable,
        ['-XshowSettings:properties', '-version'],
        { timeout: PROBE_TIMEOUT_MS }
      );
      stderr = result.stderr;
    } catch (error) {
      throw new JvmError(
        JvmErrorCode.PROBE_FAILED,
        `Failed to resolve JVM settings for '${javaExecutable}': ${error instanceof Error ? error.message : 'Unknown error'}`,
        { javaExecutable }
      );
    }

    const properties = JavaPropertiesProbe.toJavaProperties(
      JavaPropertiesProbe.parse(stderr),
      javaExecutable
    );
    logger.debug(`Probed ${javaExecutable}`, properties);
    return properties;
  }

  static parse(output: string): ReportedSettings {
    const settings: ReportedSettings = {};
    let lastKey: string | null = null;

    for (const line of output.split(/\r?\n/)) {
      if (line.startsWith('        ') && lastKey !== null) {
        const previous = settings[lastKey];
        const values = Array.isArray(previous) ? previous : [previous];
        settings[lastKey] = [...values, line.trim()];
      } else if (line.startsWith('    ')) {
        const separator = line.indexOf('=');
        if (separator === -1) {
          continue;
        }
        lastKey = line.slice(0, separator).trim();
        settings[lastKey] = line.slice(separator + 1).trim();
      } else {
        lastKey = null;
      }
    }

    return settings;
  }

  static toJavaProperties(settings: ReportedSettings, source: string): JavaProperties {
    const read = (key: string): string | undefined => {
      const value = settings[key];
      return Array.isArray(value) ? value[0] : value;
    };

    const javaHome = read('java.home');
    const javaVersion = read('java.version');
    if (!javaHome || !javaVersion) {
      throw new JvmError(
        JvmErrorCode.PROBE_FAILED,
        `'${source}' did not report java.home and java.version`,
        { javaExecutable: source }
      );
    }

    return {
      javaHome,
      javaVersion,
      vendor: read('java.vm.vendor') || read('java.vendor') || 'unknown',
    };
  }
}
