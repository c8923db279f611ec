// src/commands/inspect.ts - Classify an explicitly supplied java home
import { Command, Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { ConfigManager } from '../core/ConfigManager';
import { Jvm } from '../core/jvm/Jvm';
import { JavaVersion } from '../core/jvm/JavaVersion';
import { formatJvmReport } from '../utils/JvmReport';
import { logger } from '../utils/Logger';

export default class Inspect extends Command {
  static override description = 'Resolve the JDK or JRE installed at a directory';

  static override examples = [
    '<%= config.bin %> <%= command.id %> /usr/lib/jvm/java-8-openjdk/jre',
    '<%= config.bin %> <%= command.id %> "C:\\Program Files\\Java\\jre6" --java-version 1.6.0',
    '<%= config.bin %> <%= command.id %> /Library/Java/JavaVirtualMachines/jdk-11.jdk/Contents/Home --json',
  ];

  static override args = {
    home: Args.string({
      description: 'Java home directory',
      required: true,
    }),
  };

  static override flags = {
    'java-version': Flags.string({
      description: 'Java version of the installation (read from its release file when omitted)',
    }),
    vendor: Flags.string({
      description: 'Vendor string, e.g. "Apple Inc." or "IBM Corporation"',
    }),
    json: Flags.boolean({
      char: 'j',
      description: 'Output in JSON format',
      default: false,
    }),
    verbose: Flags.boolean({
      char: 'v',
      description: 'Log classification details',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Inspect);
    logger.setLevel(flags.verbose ? 'debug' : ConfigManager.getInstance().load().logLevel);

    const javaVersion = flags['java-version'];
    if (javaVersion !== undefined && !JavaVersion.isValid(javaVersion)) {
      this.error(`Invalid java version: ${javaVersion}`);
    }

    try {
      const jvm = Jvm.forHome(args.home, {
        ...(javaVersion !== undefined && { javaVersion }),
        ...(flags.vendor !== undefined && { vendor: flags.vendor }),
      });

      if (flags.json) {
        this.log(JSON.stringify(jvm.describe(), null, 2));
        return;
      }

      this.log(chalk.blue(`🔍 ${jvm.toString()}\n`));
      formatJvmReport(jvm.describe()).forEach(line => this.log(line));
    } catch (error) {
      logger.error(`Failed to inspect ${args.home}`, error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }
  }
}
