export enum JvmErrorCode {
  INVALID_HOME = 'INVALID_HOME',
  JAVA_HOME_INVALID = 'JAVA_HOME_INVALID',
  PROBE_FAILED = 'PROBE_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export class JvmError extends Error {
  readonly code: JvmErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: JvmErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'JvmError';
    this.code = code;
    this.context = context;
  }
}

/**
 * The supplied home does not exist or is not a directory. Raised before any classification runs.
 */
export class InvalidHomeError extends JvmError {
  constructor(javaHome: string) {
    super(
      JvmErrorCode.INVALID_HOME,
      `Supplied javaHome must be a valid directory. You supplied: ${javaHome}`,
      { javaHome }
    );
    this.name = 'InvalidHomeError';
  }
}

export class JavaHomeError extends JvmError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(JvmErrorCode.JAVA_HOME_INVALID, message, context);
    this.name = 'JavaHomeError';
  }

  static missingExecutable(executable: string, javaHome: string, triedLocation: string): JavaHomeError {
    return new JavaHomeError(
      `The supplied javaHome seems to be invalid. I cannot find the ${executable} executable. ` +
        `Tried location: ${triedLocation} (javaHome: ${javaHome})`,
      { executable, javaHome, triedLocation }
    );
  }
}
