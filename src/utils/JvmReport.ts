import chalk from 'chalk';
import { JvmDescription } from '../types/Jvm';

const LABELS: Array<[keyof JvmDescription, string]> = [
  ['javaHome', 'Java home'],
  ['kind', 'Layout'],
  ['javaVersion', 'Version'],
  ['vendor', 'Vendor'],
  ['javaExecutable', 'java'],
  ['javacExecutable', 'javac'],
  ['javadocExecutable', 'javadoc'],
  ['toolsJar', 'tools.jar'],
  ['runtimeJar', 'rt.jar'],
  ['jre', 'JRE'],
  ['standaloneJre', 'Standalone JRE'],
];

/**
 * Aligned `label: value` lines; absent optional entries are shown as `-`.
 */
export function formatJvmReport(description: JvmDescription): string[] {
  const width = Math.max(...LABELS.map(([, label]) => label.length));

  return LABELS.map(([key, label]) => {
    const value = description[key];
    const shown = value === undefined ? chalk.gray('-') : chalk.white(value);
    return `  ${chalk.cyan(label.padEnd(width))}  ${shown}`;
  });
}
