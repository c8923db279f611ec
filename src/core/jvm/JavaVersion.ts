/**
 * Java version as far as layout decisions need it: the feature release number, read from both the
 * legacy `1.x` scheme and the post-9 scheme.
 */
export class JavaVersion {
  private constructor(
    readonly majorVersion: number,
    private readonly versionString: string
  ) {}

  /**
   * Parses `1.5.0_22`, `1.6.0`, `1.9`, `9-ea`, `11.0.2`, `17.0.1+12` and the like.
   */
  static toVersion(value: string): JavaVersion {
    const trimmed = value.trim();
    const match = /^(\d+)(?:\.(\d+))?/.exec(trimmed);

    if (!match) {
      throw new Error(`Could not determine java version from '${value}'.`);
    }

    const first = parseInt(match[1], 10);
    const major = first === 1 && match[2] !== undefined ? parseInt(match[2], 10) : first;

    if (major < 1) {
      throw new Error(`Could not determine java version from '${value}'.`);
    }

    return new JavaVersion(major, trimmed);
  }

  static isValid(value: string): boolean {
    try {
      JavaVersion.toVersion(value);
      return true;
    } catch {
      return false;
    }
  }

  isJava5(): boolean {
    return this.majorVersion === 5;
  }

  isJava6(): boolean {
    return this.majorVersion === 6;
  }

  isJava7(): boolean {
    return this.majorVersion === 7;
  }

  isJava8(): boolean {
    return this.majorVersion === 8;
  }

  /**
   * From 9 on there is no `jre/` inside a JDK and no `tools.jar`.
   */
  isJava9Compatible(): boolean {
    return this.majorVersion >= 9;
  }

  /** The string this version was parsed from. */
  get fullVersion(): string {
    return this.versionString;
  }

  equals(other: JavaVersion): boolean {
    return this.majorVersion === other.majorVersion;
  }

  toString(): string {
    return this.majorVersion <= 8 ? `1.${this.majorVersion}` : `${this.majorVersion}`;
  }
}
