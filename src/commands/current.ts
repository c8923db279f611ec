// src/commands/current.ts - Describe the JVM this machine reports
import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { ConfigManager } from '../core/ConfigManager';
import { Jvm } from '../core/jvm/Jvm';
import { JavaPropertiesProbe } from '../core/jvm/JavaPropertiesProbe';
import { currentOperatingSystem } from '../core/os/OperatingSystem';
import { SystemProperties } from '../core/SystemProperties';
import { formatJvmReport } from '../utils/JvmReport';
import { logger } from '../utils/Logger';

export default class Current extends Command {
  static override description = 'Show the current JVM resolved from JAVA_HOME, configuration or the PATH';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --probe',
    '<%= config.bin %> <%= command.id %> --json',
  ];

  static override flags = {
    json: Flags.boolean({
      char: 'j',
      description: 'Output in JSON format',
      default: false,
    }),
    probe: Flags.boolean({
      char: 'p',
      description: 'Ask the java executable on the PATH for its java.home, java.version and vendor',
      default: false,
    }),
    verbose: Flags.boolean({
      char: 'v',
      description: 'Log classification details',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Current);
    logger.setLevel(flags.verbose ? 'debug' : ConfigManager.getInstance().load().logLevel);

    try {
      if (flags.probe) {
        await this.probeJavaOnPath();
      }

      const jvm = Jvm.current();

      if (flags.json) {
        this.log(JSON.stringify(jvm.describe(), null, 2));
        return;
      }

      this.log(chalk.blue(`☕ ${jvm.toString()}\n`));
      formatJvmReport(jvm.describe()).forEach(line => this.log(line));
    } catch (error) {
      logger.error('Failed to resolve the current JVM', error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }
  }

  private async probeJavaOnPath(): Promise<void> {
    const os = currentOperatingSystem();
    const javaExecutable = os.findInPath(os.executableNameFor('java'));
    if (!javaExecutable) {
      this.warn('No java executable on the PATH to probe, using the configured properties');
      return;
    }

    const spinner = ora(`Probing ${javaExecutable}...`).start();
    try {
      const properties = await JavaPropertiesProbe.probe(javaExecutable);
      SystemProperties.getInstance().apply(properties);
      Jvm.resetCurrent();
      spinner.succeed(`Probed ${javaExecutable}`);
    } catch (error) {
      spinner.fail(`Failed to probe ${javaExecutable}`);
      throw error;
    }
  }
}
