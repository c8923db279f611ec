import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'yaml';
import { ConfigFile, JvmLocatorConfig } from '../types/Config';
import { isLogLevel } from '../utils/Logger';
import { JvmError, JvmErrorCode } from './errors';

export const PROJECT_CONFIG_FILE = 'jvm-locator.yml';

export interface ConfigManagerOptions {
  projectDir?: string;
  configDir?: string;
}

/**
 * Loads `~/.jvm-locator/config.yml`, then lets `jvm-locator.yml` in the project directory override it.
 * Reads are synchronous because JVM detection is.
 */
export class ConfigManager {
  private static instance: ConfigManager;
  private readonly projectDir: string;
  private readonly globalConfigPath: string;
  private config: JvmLocatorConfig | null = null;

  constructor(options: ConfigManagerOptions = {}) {
    this.projectDir = options.projectDir ?? process.cwd();
    const configDir = options.configDir ?? path.join(os.homedir(), '.jvm-locator');
    this.globalConfigPath = path.join(configDir, 'config.yml');
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  load(): JvmLocatorConfig {
    if (this.config) {
      return this.config;
    }

    const globalConfig = this.loadFile(this.globalConfigPath) ?? {};
    const projectConfig = this.loadFile(path.join(this.projectDir, PROJECT_CONFIG_FILE)) ?? {};

    this.config = {
      ...this.createDefaultConfig(),
      ...globalConfig,
      ...projectConfig,
    };
    return this.config;
  }

  reload(): JvmLocatorConfig {
    this.config = null;
    return this.load();
  }

  loadFile(configPath: string): ConfigFile | null {
    if (!fs.pathExistsSync(configPath)) {
      return null;
    }

    let parsed: unknown;
    try {
      // Scalars stay strings, so `javaVersion: 1.10` is not read as the number 1.1
      parsed = yaml.parse(fs.readFileSync(configPath, 'utf8'), { schema: 'failsafe' });
    } catch (error) {
      throw new JvmError(
        JvmErrorCode.CONFIG_INVALID,
        `Failed to load config at ${configPath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { configPath }
      );
    }

    return this.validateConfig(parsed, configPath);
  }

  private createDefaultConfig(): JvmLocatorConfig {
    return {
      logLevel: 'warn',
    };
  }

  private validateConfig(parsed: unknown, configPath: string): ConfigFile {
    // An empty file parses to null
    if (parsed === null || parsed === undefined || parsed === '') {
      return {};
    }

    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new JvmError(JvmErrorCode.CONFIG_INVALID, `Config at ${configPath} must be a mapping`, {
        configPath,
      });
    }

    const raw = new Map(Object.entries(parsed));
    const config: ConfigFile = {};

    for (const key of ['javaHome', 'javaVersion', 'vendor'] as const) {
      const value = raw.get(key);
      if (value === undefined || value === null || value === '') {
        continue;
      }
      if (typeof value !== 'string') {
        throw new JvmError(
          JvmErrorCode.CONFIG_INVALID,
          `Config at ${configPath}: '${key}' must be a string`,
          { configPath, key }
        );
      }
      config[key] = value;
    }

    const logLevel = raw.get('logLevel');
    if (logLevel !== undefined) {
      if (!isLogLevel(logLevel)) {
        throw new JvmError(
          JvmErrorCode.CONFIG_INVALID,
          `Config at ${configPath}: 'logLevel' must be one of debug, info, warn, error`,
          { configPath, key: 'logLevel' }
        );
      }
      config.logLevel = logLevel;
    }

    return config;
  }
}
