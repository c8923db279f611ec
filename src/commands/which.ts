// src/commands/which.ts - Resolve a JDK tool through the home, PATH, bare-name fallback chain
import { Command, Args, Flags } from '@oclif/core';
import { ConfigManager } from '../core/ConfigManager';
import { Jvm } from '../core/jvm/Jvm';
import { logger } from '../utils/Logger';

export default class Which extends Command {
  static override description = 'Print the path of a Java tool such as javac, jar or keytool';

  static override examples = [
    '<%= config.bin %> <%= command.id %> javac',
    '<%= config.bin %> <%= command.id %> jar --home /opt/jdk1.8.0_202',
    '<%= config.bin %> <%= command.id %> keytool --strict',
  ];

  static override args = {
    name: Args.string({
      description: 'Executable name without platform suffix',
      required: true,
    }),
  };

  static override flags = {
    home: Flags.string({
      description: 'Java home to search instead of the current JVM',
    }),
    strict: Flags.boolean({
      char: 's',
      description: 'Fail instead of falling back to the PATH or the bare name',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Which);
    logger.setLevel(ConfigManager.getInstance().load().logLevel);

    try {
      const jvm = flags.home ? Jvm.forHome(flags.home) : Jvm.current();
      this.log(flags.strict ? jvm.requireExecutable(args.name) : jvm.getExecutable(args.name));
    } catch (error) {
      logger.error(`Failed to resolve ${args.name}`, error);
      this.error(error instanceof Error ? error.message : 'Unknown error occurred');
    }
  }
}
