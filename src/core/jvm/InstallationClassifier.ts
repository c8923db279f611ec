import * as path from 'path';
import { InstallationKind, InstallationLayout } from '../../types/Jvm';
import { FileSystem } from '../../utils/FileSystem';
import { logger } from '../../utils/Logger';
import { InvalidHomeError } from '../errors';
import { OperatingSystem } from '../os/OperatingSystem';
import { JavaVersion } from './JavaVersion';

interface ClassificationContext {
  home: string;
  version: JavaVersion;
  os: OperatingSystem;
}

/**
 * One directory shape. `applies` only probes the disk; `build` produces the layout once it matched.
 */
interface LayoutRule {
  name: string;
  legacyOnly?: boolean;
  modernOnly?: boolean;
  applies(context: ClassificationContext): boolean;
  build(context: ClassificationContext): InstallationLayout;
}

const log = logger.scoped('classifier');

function toolsJarIn(home: string): string {
  return path.join(home, 'lib', 'tools.jar');
}

function hasJavaExecutable(home: string, os: OperatingSystem): boolean {
  return FileSystem.isFile(path.join(home, 'bin', os.executableNameFor('java')));
}

function isNestedRuntime({ home, os }: ClassificationContext): boolean {
  return path.basename(home) === 'jre' && hasJavaExecutable(path.dirname(home), os);
}

function jdkLayout(suppliedHome: string, javaHome: string, toolsJarPath?: string): InstallationLayout {
  const embeddedJreHome = path.join(javaHome, 'jre');
  if (FileSystem.isDirectory(embeddedJreHome)) {
    return {
      kind: 'JdkWithEmbeddedJre',
      suppliedHome,
      javaHome,
      embeddedJreHome,
      ...(toolsJarPath && { toolsJarPath }),
    };
  }
  return { kind: 'Jdk', suppliedHome, javaHome, ...(toolsJarPath && { toolsJarPath }) };
}

function plainLayout(kind: InstallationKind, home: string): InstallationLayout {
  return { kind, suppliedHome: home, javaHome: home };
}

export const LAYOUT_RULES: readonly LayoutRule[] = [
  {
    name: 'embedded-jre',
    legacyOnly: true,
    applies: context =>
      isNestedRuntime(context) && FileSystem.isFile(toolsJarIn(path.dirname(context.home))),
    build: ({ home }) => {
      const javaHome = path.dirname(home);
      return {
        kind: 'JdkWithEmbeddedJre',
        suppliedHome: home,
        javaHome,
        embeddedJreHome: home,
        toolsJarPath: toolsJarIn(javaHome),
      };
    },
  },
  {
    name: 'jdk-with-tools-jar',
    legacyOnly: true,
    applies: ({ home }) => FileSystem.isFile(toolsJarIn(home)),
    build: ({ home }) => jdkLayout(home, home, toolsJarIn(home)),
  },
  {
    name: 'runtime-inside-jdk',
    modernOnly: true,
    applies: isNestedRuntime,
    build: ({ home }) => ({ kind: 'Jdk', suppliedHome: home, javaHome: path.dirname(home) }),
  },
  {
    name: 'macos-bundle',
    applies: ({ home }) =>
      path.basename(home) === 'Home' &&
      path.basename(path.dirname(home)) === 'Contents' &&
      ['bin', 'lib', 'conf'].every(dir => FileSystem.isDirectory(path.join(home, dir))) &&
      !FileSystem.exists(path.join(home, 'jre')) &&
      !FileSystem.exists(toolsJarIn(home)),
    build: ({ home }) => plainLayout('MacOsBundleJdk', home),
  },
  {
    name: 'modular-jdk',
    modernOnly: true,
    applies: ({ home, os }) => FileSystem.isFile(path.join(home, 'bin', os.executableNameFor('javac'))),
    build: ({ home }) => plainLayout('Jdk', home),
  },
  {
    name: 'standalone-jre',
    applies: () => true,
    build: ({ home }) => plainLayout('StandaloneJre', home),
  },
];

function ruleApplies(rule: LayoutRule, context: ClassificationContext): boolean {
  const modern = context.version.isJava9Compatible();
  if ((rule.legacyOnly && modern) || (rule.modernOnly && !modern)) {
    return false;
  }
  return rule.applies(context);
}

/**
 * Windows installers put versioned JRE and JDK directories side by side (`jre6` next to `jdk1.6.0`).
 * A home on the JRE side is redirected to its JDK; a home on the JDK side records its JRE peer.
 */
export function applyWindowsSiblings(
  layout: InstallationLayout,
  version: JavaVersion
): InstallationLayout {
  const dirName = path.basename(layout.javaHome);
  const parent = path.dirname(layout.javaHome);
  const fullVersion = version.fullVersion;

  if (/^jre\d+$/.test(dirName) || dirName === `jre${fullVersion}`) {
    const jdkHome = path.join(parent, `jdk${fullVersion}`);
    const toolsJarPath = toolsJarIn(jdkHome);
    if (!FileSystem.isFile(toolsJarPath)) {
      return layout;
    }

    log.debug(`Redirecting ${layout.javaHome} to sibling JDK ${jdkHome}`);
    return { ...jdkLayout(layout.suppliedHome, jdkHome, toolsJarPath), peerJreHome: layout.javaHome };
  }

  if (dirName === `jdk${fullVersion}`) {
    const peerJreHome = [`jre${version.majorVersion}`, `jre${fullVersion}`]
      .map(name => path.join(parent, name))
      .find(candidate => FileSystem.isDirectory(candidate));

    return peerJreHome ? { ...layout, peerJreHome } : layout;
  }

  return layout;
}

/**
 * Decides which installation layout `home` has. The first matching rule in {@link LAYOUT_RULES} wins.
 *
 * @throws InvalidHomeError when `home` is missing or not a directory.
 */
export function classify(
  home: string,
  version: JavaVersion,
  os: OperatingSystem
): InstallationLayout {
  const normalizedHome = FileSystem.normalizePath(home);
  if (!FileSystem.isDirectory(normalizedHome)) {
    throw new InvalidHomeError(home);
  }

  const context: ClassificationContext = { home: normalizedHome, version, os };
  const rule = LAYOUT_RULES.find(candidate => ruleApplies(candidate, context));
  // standalone-jre always applies, so there is always a rule
  const layout = rule ? rule.build(context) : plainLayout('StandaloneJre', normalizedHome);

  log.debug(`Classified ${normalizedHome} as ${layout.kind}`, { rule: rule?.name, version: version.fullVersion });

  if (os.isWindowsFamily() && !version.isJava9Compatible()) {
    return applyWindowsSiblings(layout, version);
  }
  return layout;
}
