import * as path from 'path';
import {
  InstallationKind,
  InstallationLayout,
  JavaInfo,
  JavaProperties,
  JvmDescription,
  JvmVendorTag,
} from '../../types/Jvm';
import { FileSystem } from '../../utils/FileSystem';
import { logger } from '../../utils/Logger';
import { InvalidHomeError, JavaHomeError } from '../errors';
import { OperatingSystem, currentOperatingSystem } from '../os/OperatingSystem';
import { SystemProperties } from '../SystemProperties';
import { classify } from './InstallationClassifier';
import { detectJavaVersion, detectVendor } from './JavaRelease';
import { JavaVersion } from './JavaVersion';
import { VendorBehavior, vendorBehaviorFor } from './JvmVendor';

export interface ForHomeOptions {
  javaVersion?: string | JavaVersion;
  vendor?: string;
  os?: OperatingSystem;
}

function jreAt(homeDir: string): JavaInfo {
  return Object.freeze({ homeDir, toString: () => `JRE at ${homeDir}` });
}

/**
 * A resolved Java installation. Built once from a single classification of its home directory and
 * immutable afterwards. Two instances are equal when their resolved homes are.
 */
export class Jvm {
  private static currentJvm: Jvm | null = null;
  private readonly log = logger.scoped('jvm');

  private constructor(
    readonly layout: InstallationLayout,
    readonly javaVersion: JavaVersion,
    private readonly os: OperatingSystem,
    private readonly behavior: VendorBehavior,
    private readonly userSupplied: boolean
  ) {}

  /**
   * The JVM reported by the ambient {@link SystemProperties}, detected on first use and then reused
   * until {@link resetCurrent}.
   */
  static current(): Jvm {
    if (!Jvm.currentJvm) {
      Jvm.currentJvm = Jvm.detect();
    }
    return Jvm.currentJvm;
  }

  static resetCurrent(): void {
    Jvm.currentJvm = null;
  }

  /**
   * Uncached detection from a snapshot of the ambient properties.
   */
  static detect(os: OperatingSystem = currentOperatingSystem()): Jvm {
    return Jvm.create(SystemProperties.getInstance().snapshot(os), os);
  }

  /**
   * Picks the vendor variant from `properties.vendor` and resolves `properties.javaHome`.
   */
  static create(properties: JavaProperties, os: OperatingSystem = currentOperatingSystem()): Jvm {
    const version = JavaVersion.toVersion(properties.javaVersion);
    const layout = classify(properties.javaHome, version, os);
    return new Jvm(layout, version, os, vendorBehaviorFor(properties.vendor), false);
  }

  /**
   * Resolves an explicitly supplied home. The `java` executable must exist under the resolved home.
   *
   * @throws InvalidHomeError when `javaHome` is not a directory.
   * @throws JavaHomeError when the home holds no `bin/java`.
   */
  static forHome(javaHome: string, options: ForHomeOptions = {}): Jvm {
    const home = FileSystem.normalizePath(javaHome);
    if (!FileSystem.isDirectory(home)) {
      throw new InvalidHomeError(javaHome);
    }

    const os = options.os ?? currentOperatingSystem();
    const ambient = SystemProperties.getInstance();
    const version =
      options.javaVersion instanceof JavaVersion
        ? options.javaVersion
        : JavaVersion.toVersion(
            options.javaVersion ?? detectJavaVersion(home, ambient.get('java.version'))
          );
    const vendor = options.vendor ?? detectVendor(home, ambient.get('java.vm.vendor'));

    const jvm = new Jvm(classify(home, version, os), version, os, vendorBehaviorFor(vendor), true);
    jvm.requireExecutable('java');

    if (Jvm.currentJvm?.equals(jvm)) {
      return Jvm.currentJvm;
    }
    return jvm;
  }

  get javaHome(): string {
    return this.layout.javaHome;
  }

  get kind(): InstallationKind {
    return this.layout.kind;
  }

  get vendor(): JvmVendorTag {
    return this.behavior.tag;
  }

  get javaExecutable(): string {
    return this.getExecutable('java');
  }

  get javacExecutable(): string {
    return this.getExecutable('javac');
  }

  get javadocExecutable(): string {
    return this.getExecutable('javadoc');
  }

  get toolsJar(): string | undefined {
    return this.behavior.toolsJar(this.layout, this.javaVersion);
  }

  get runtimeJar(): string | undefined {
    return this.behavior.runtimeJar(this.layout, this.javaVersion);
  }

  /**
   * The runtime belonging to this JVM: the JDK's embedded `jre/`, or the supplied home itself when it
   * is a JRE. Java 9+ has no separate runtime.
   */
  get jre(): JavaInfo | undefined {
    if (this.javaVersion.isJava9Compatible()) {
      return undefined;
    }

    const { embeddedJreHome, kind, javaHome, peerJreHome, suppliedHome } = this.layout;
    if (embeddedJreHome) {
      return jreAt(embeddedJreHome);
    }
    if (kind === 'StandaloneJre') {
      return jreAt(javaHome);
    }
    if (peerJreHome !== undefined && peerJreHome === suppliedHome) {
      return jreAt(peerJreHome);
    }
    return undefined;
  }

  /**
   * A JRE installed on its own: the Windows versioned sibling, or this home when it is only a JRE.
   */
  get standaloneJre(): JavaInfo | undefined {
    if (this.javaVersion.isJava9Compatible()) {
      return undefined;
    }

    if (this.layout.peerJreHome) {
      return jreAt(this.layout.peerJreHome);
    }
    if (this.layout.kind === 'StandaloneJre') {
      return jreAt(this.layout.javaHome);
    }
    return undefined;
  }

  isIbmJvm(): boolean {
    return this.behavior.ibm;
  }

  /**
   * Environment variables a child JVM may inherit from `env`.
   */
  inheritableEnvironment(env: Record<string, string>): Record<string, string> {
    return this.behavior.inheritableEnvironment(env);
  }

  /**
   * Looks in `<javaHome>/bin`, then on the PATH, and finally returns the bare executable name for the
   * OS to resolve at invocation time. Never throws.
   */
  getExecutable(name: string): string {
    const executable = this.findInHome(name);
    if (executable) {
      return executable;
    }

    const executableName = this.os.executableNameFor(name);
    const pathExecutable = this.os.findInPath(executableName);
    if (pathExecutable) {
      this.log.info(`Unable to find the '${name}' executable in ${this.javaHome}, using ${pathExecutable} from the PATH`);
      return pathExecutable;
    }

    this.log.warn(
      `Unable to find the '${name}' executable. Tried the java home: ${this.javaHome} and the PATH. ` +
        'Assuming it can be run from the current working directory.'
    );
    return executableName;
  }

  /**
   * Like {@link getExecutable} but only looks under `<javaHome>/bin`.
   *
   * @throws JavaHomeError naming `name` and the home when the executable is missing.
   */
  requireExecutable(name: string): string {
    const executable = this.findInHome(name);
    if (executable) {
      return executable;
    }
    throw JavaHomeError.missingExecutable(name, this.javaHome, this.homeExecutable(name));
  }

  /** Key for deduplicating JVMs in maps and sets. */
  get hashKey(): string {
    return FileSystem.normalizePath(this.javaHome);
  }

  equals(other: unknown): boolean {
    return other instanceof Jvm && other.hashKey === this.hashKey;
  }

  describe(): JvmDescription {
    return {
      javaHome: this.javaHome,
      kind: this.kind,
      vendor: this.vendor,
      javaVersion: this.javaVersion.fullVersion,
      javaExecutable: this.javaExecutable,
      javacExecutable: this.javacExecutable,
      javadocExecutable: this.javadocExecutable,
      ...(this.toolsJar && { toolsJar: this.toolsJar }),
      ...(this.runtimeJar && { runtimeJar: this.runtimeJar }),
      ...(this.jre && { jre: this.jre.homeDir }),
      ...(this.standaloneJre && { standaloneJre: this.standaloneJre.homeDir }),
    };
  }

  toString(): string {
    if (this.userSupplied) {
      return `User-supplied java: ${this.javaHome}`;
    }
    return `${this.javaVersion.fullVersion} (${this.vendor}) at ${this.javaHome}`;
  }

  private homeExecutable(name: string): string {
    return path.join(this.javaHome, 'bin', this.os.executableNameFor(name));
  }

  private findInHome(name: string): string | undefined {
    const executable = this.homeExecutable(name);
    return FileSystem.isFile(executable) ? executable : undefined;
  }
}
