import * as path from 'path';
import { JavaProperties } from '../types/Jvm';
import { FileSystem } from '../utils/FileSystem';
import { ConfigManager } from './ConfigManager';
import { JavaHomeError } from './errors';
import { detectJavaVersion, detectVendor } from './jvm/JavaRelease';
import { OperatingSystem, currentOperatingSystem } from './os/OperatingSystem';

export type JavaPropertyKey = 'java.home' | 'java.version' | 'java.vm.vendor';

export interface SystemPropertiesOptions {
  env?: NodeJS.ProcessEnv;
  config?: ConfigManager;
}

/**
 * The ambient "reported" JVM identity. Values set here win over configuration, which wins over the
 * environment. Detection never reads this directly; it takes a {@link snapshot}.
 */
export class SystemProperties {
  private static instance: SystemProperties;
  private readonly overrides = new Map<JavaPropertyKey, string>();
  private readonly env: NodeJS.ProcessEnv;
  private readonly config: ConfigManager;

  constructor(options: SystemPropertiesOptions = {}) {
    this.env = options.env ?? process.env;
    this.config = options.config ?? ConfigManager.getInstance();
  }

  static getInstance(): SystemProperties {
    if (!SystemProperties.instance) {
      SystemProperties.instance = new SystemProperties();
    }
    return SystemProperties.instance;
  }

  /**
   * Replaces the ambient instance, e.g. with one reading an isolated configuration.
   */
  static setInstance(instance: SystemProperties): void {
    SystemProperties.instance = instance;
  }

  get(key: JavaPropertyKey): string | undefined {
    const override = this.overrides.get(key);
    if (override !== undefined) {
      return override;
    }

    const config = this.config.load();
    switch (key) {
      case 'java.home':
        return config.javaHome ?? (this.env.JAVA_HOME || undefined);
      case 'java.version':
        return config.javaVersion;
      case 'java.vm.vendor':
        return config.vendor;
    }
  }

  set(key: JavaPropertyKey, value: string): void {
    this.overrides.set(key, value);
  }

  clear(key: JavaPropertyKey): void {
    this.overrides.delete(key);
  }

  reset(): void {
    this.overrides.clear();
  }

  apply(properties: Partial<JavaProperties>): void {
    if (properties.javaHome !== undefined) this.set('java.home', properties.javaHome);
    if (properties.javaVersion !== undefined) this.set('java.version', properties.javaVersion);
    if (properties.vendor !== undefined) this.set('java.vm.vendor', properties.vendor);
  }

  /**
   * Freezes the current values. A missing home is taken from the `java` on the PATH; a missing
   * version or vendor from the home's `release` file.
   *
   * @throws JavaHomeError when no home can be found at all.
   */
  snapshot(os: OperatingSystem = currentOperatingSystem()): JavaProperties {
    const javaHome = this.get('java.home') ?? this.javaHomeFromPath(os);
    if (!javaHome) {
      throw new JavaHomeError(
        'Unable to determine the java home. Set JAVA_HOME, configure javaHome in jvm-locator.yml ' +
          'or put java on the PATH.'
      );
    }

    return Object.freeze({
      javaHome,
      javaVersion: this.get('java.version') ?? detectJavaVersion(javaHome),
      vendor: this.get('java.vm.vendor') ?? detectVendor(javaHome),
    });
  }

  private javaHomeFromPath(os: OperatingSystem): string | undefined {
    const javaExecutable = os.findInPath(os.executableNameFor('java'));
    if (!javaExecutable) {
      return undefined;
    }
    // <home>/bin/java, usually behind a symlink such as /usr/bin/java
    return path.dirname(path.dirname(FileSystem.resolveRealPath(javaExecutable)));
  }
}
