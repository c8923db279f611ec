import { LogLevel } from '../utils/Logger';

export interface JvmLocatorConfig {
  javaHome?: string | undefined;
  javaVersion?: string | undefined;
  vendor?: string | undefined;
  logLevel: LogLevel;
}

export type ConfigFile = Partial<JvmLocatorConfig>;
