import * as path from 'path';
import which from 'which';

export interface OperatingSystem {
  readonly name: string;
  executableNameFor(baseName: string): string;
  /**
   * Absolute path of the first executable `executableName` on `PATH`, or null.
   */
  findInPath(executableName: string): string | null;
  isWindowsFamily(): boolean;
  isMacOs(): boolean;
}

abstract class BaseOperatingSystem implements OperatingSystem {
  protected abstract readonly pathSeparator: string;

  constructor(
    readonly name: string,
    protected readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  abstract executableNameFor(baseName: string): string;

  findInPath(executableName: string): string | null {
    const entries = this.getPathEntries();
    if (entries.length === 0) {
      return null;
    }

    const found = which.sync(executableName, {
      path: entries.join(this.pathSeparator),
      delimiter: this.pathSeparator,
      nothrow: true,
      ...this.whichOptions(),
    });
    return found ? path.resolve(found) : null;
  }

  isWindowsFamily(): boolean {
    return false;
  }

  isMacOs(): boolean {
    return false;
  }

  protected whichOptions(): Pick<which.Options, 'pathExt'> {
    return {};
  }

  protected getPathEntries(): string[] {
    const value = this.env.PATH ?? '';
    return value.split(this.pathSeparator).filter(entry => entry.length > 0);
  }
}

export class WindowsOperatingSystem extends BaseOperatingSystem {
  protected readonly pathSeparator = ';';

  constructor(env: NodeJS.ProcessEnv = process.env) {
    super('windows', env);
  }

  executableNameFor(baseName: string): string {
    if (/\.(exe|bat|cmd)$/i.test(baseName)) {
      return baseName;
    }
    return `${baseName}.exe`;
  }

  override isWindowsFamily(): boolean {
    return true;
  }

  // Names arrive suffixed by executableNameFor; these extensions only decide what counts as executable
  protected override whichOptions(): Pick<which.Options, 'pathExt'> {
    return { pathExt: '.EXE;.BAT;.CMD' };
  }

  protected override getPathEntries(): string[] {
    // Windows keeps the variable as `Path`, and env lookups in Node are only case-insensitive on win32
    const key = Object.keys(this.env).find(name => name.toUpperCase() === 'PATH');
    const value = key ? (this.env[key] ?? '') : '';
    return value.split(this.pathSeparator).filter(entry => entry.length > 0);
  }
}

export class UnixOperatingSystem extends BaseOperatingSystem {
  protected readonly pathSeparator = ':';

  constructor(name: string = 'unix', env: NodeJS.ProcessEnv = process.env) {
    super(name, env);
  }

  executableNameFor(baseName: string): string {
    return baseName;
  }
}

export class MacOsOperatingSystem extends UnixOperatingSystem {
  constructor(env: NodeJS.ProcessEnv = process.env) {
    super('macos', env);
  }

  override isMacOs(): boolean {
    return true;
  }
}

let currentOs: OperatingSystem | null = null;

export function operatingSystemFor(
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv = process.env
): OperatingSystem {
  switch (platform) {
    case 'win32':
      return new WindowsOperatingSystem(env);
    case 'darwin':
      return new MacOsOperatingSystem(env);
    default:
      return new UnixOperatingSystem(platform, env);
  }
}

export function currentOperatingSystem(): OperatingSystem {
  if (!currentOs) {
    currentOs = operatingSystemFor(process.platform);
  }
  return currentOs;
}
